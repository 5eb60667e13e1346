import { LicensingModule, LicensingUnavailableError } from './types';

const fail = (operation: string): never => {
  throw new LicensingUnavailableError(operation);
};

export const unavailableLicensingModule: LicensingModule = {
  available: false,
  getSystemStatus: () => fail('status'),
  buildPackage: () => fail('package generation'),
  buildManifest: () => fail('manifest generation'),
  validatePackage: () => fail('package validation'),
};
