import { AppConfig } from '../utils/appConfig';
import { createLicensingModule, LicensingModule } from './licensing';

/**
 * Everything a single session owns besides its store state. Handed to thunks as
 * the extra argument and to components through `SessionServicesProvider`.
 */
export interface SessionServices {
  config: AppConfig;
  licensing: LicensingModule;
  now: () => Date;
}

export const createSessionServices = (
  config: AppConfig,
  overrides: Partial<Omit<SessionServices, 'config'>> = {},
): SessionServices => ({
  config,
  licensing: overrides.licensing ?? createLicensingModule(config),
  now: overrides.now ?? (() => new Date()),
});
