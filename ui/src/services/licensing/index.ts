import { AppConfig } from '../../utils/appConfig';
import { mockLicensingModule } from './mockLicensingModule';
import { unavailableLicensingModule } from './unavailableLicensingModule';
import { LicensingModule } from './types';

export const createLicensingModule = (config: AppConfig): LicensingModule => {
  if (!config.licensingEnabled) {
    console.warn('[MigrationSuite][Licensing] module disabled; running without licensing');
    return unavailableLicensingModule;
  }
  return mockLicensingModule;
};

export { LicensingUnavailableError } from './types';
export type { LicensingModule } from './types';
export { mockLicensingModule, unavailableLicensingModule };
