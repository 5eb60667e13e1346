import {
  createLicensingModule,
  LicensingUnavailableError,
  mockLicensingModule,
  unavailableLicensingModule,
} from '.';
import { initialLicensingState } from '../../store/Licensing/types';
import { testConfig } from '../../testUtils/renderWithSession';

describe('createLicensingModule', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('selects the working module when licensing is enabled', () => {
    expect(createLicensingModule(testConfig())).toBe(mockLicensingModule);
  });

  it('selects the unavailable module when licensing is disabled', () => {
    const module = createLicensingModule(testConfig({ licensingEnabled: false }));
    expect(module).toBe(unavailableLicensingModule);
    expect(module.available).toBe(false);
  });
});

describe('unavailableLicensingModule', () => {
  it('throws on every operation', () => {
    expect(() => unavailableLicensingModule.getSystemStatus(initialLicensingState)).toThrow(LicensingUnavailableError);
    expect(() => unavailableLicensingModule.validatePackage(initialLicensingState, 'AES-256')).toThrow(
      'Licensing system is not available (package validation)'
    );
  });
});

describe('mockLicensingModule', () => {
  it('reports status from the session state', () => {
    expect(mockLicensingModule.getSystemStatus(initialLicensingState).creditsRemaining).toBe(1500);
  });
});
