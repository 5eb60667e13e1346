import configureAppStore from '../store/configureStore';
import { generateManifest, generatePackage, validatePackage } from '../store/Packaging/slice';
import { PackageRequest } from '../store/Packaging/types';
import { initialLicensingState } from '../store/Licensing/types';
import { unavailableLicensingModule } from '../services/licensing';
import { createTestServices, FROZEN_NOW } from '../testUtils/renderWithSession';

const request: PackageRequest = {
  packageName: 'Demo_Package',
  modules: { foundation: true, employee: true, payroll: false },
  security: { encrypt: true, digitalSignature: true, auditTrail: true, encryptionLevel: 'AES-128' },
  deployment: { target: 'Hybrid', autoUpdate: true, multiTenant: false, apiEnabled: true },
};

describe('packaging thunks', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stores the generated package payload', async () => {
    const store = configureAppStore(createTestServices());
    await store.dispatch(generatePackage({ request, licensing: initialLicensingState }));

    const { Packaging } = store.getState();
    expect(Packaging.generating).toBe(false);
    expect(Packaging.lastPackage?.fileName).toBe('Demo_Package_manifest.json');
    const payload = JSON.parse(Packaging.lastPackage?.data ?? '{}');
    expect(payload.generated_at).toBe(FROZEN_NOW.toISOString());
    expect(payload.components).toEqual({ foundation_module: true, employee_module: true, payroll_module: false });
    expect(payload.estimated_size_mb).toBe(105);
    expect(payload.security.encryption_level).toBe('AES-128');
    expect(payload).not.toHaveProperty('deployment');
  });

  it('produces byte-identical payloads for identical inputs', async () => {
    const first = configureAppStore(createTestServices());
    const second = configureAppStore(createTestServices());
    await first.dispatch(generatePackage({ request, licensing: initialLicensingState }));
    await second.dispatch(generatePackage({ request, licensing: initialLicensingState }));
    expect(second.getState().Packaging.lastPackage?.data).toBe(first.getState().Packaging.lastPackage?.data);
  });

  it('stores the generated manifest', async () => {
    const store = configureAppStore(createTestServices());
    await store.dispatch(generateManifest({ packageName: 'Demo_Package', licensing: initialLicensingState }));
    const manifest = JSON.parse(store.getState().Packaging.lastManifest?.data ?? '{}');
    expect(manifest.package_info.name).toBe('Demo_Package');
    expect(manifest.checksum).toBe('sha256:demo_checksum_value');
  });

  it('stores validation results', async () => {
    const store = configureAppStore(createTestServices());
    await store.dispatch(validatePackage({ licensing: initialLicensingState, encryptionLevel: 'AES-256' }));
    const results = store.getState().Packaging.validationResults ?? [];
    expect(results).toHaveLength(6);
    expect(results[0]).toEqual({ check: 'Digital Signature', result: 'Valid', passed: true });
  });

  it('keeps the error when the licensing module is unavailable', async () => {
    const store = configureAppStore(createTestServices({}, unavailableLicensingModule));
    await store.dispatch(generatePackage({ request, licensing: initialLicensingState }));
    const { Packaging } = store.getState();
    expect(Packaging.generating).toBe(false);
    expect(Packaging.lastPackage).toBeUndefined();
    expect(Packaging.lastError).toBe('Licensing system is not available (package generation)');
  });
});
