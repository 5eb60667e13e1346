import { EncryptionLevel } from '../../constants/packaging';
import { LicensingState } from '../../store/Licensing/types';
import { AvailableLicensingStatus } from '../../utils/licensingStatus';
import {
  ModuleFlags,
  PackageContents,
  PackageManifest,
  SecurityOptions,
  ValidationCheckResult,
} from '../../utils/packaging';

/**
 * Licensing and packaging collaborator. Selected once at startup; when it is
 * unavailable every operation throws `LicensingUnavailableError`.
 */
export interface LicensingModule {
  readonly available: boolean;
  getSystemStatus(state: LicensingState): AvailableLicensingStatus;
  buildPackage(
    packageName: string,
    modules: ModuleFlags,
    state: LicensingState,
    generatedAt: Date,
    security: SecurityOptions,
  ): PackageContents;
  buildManifest(packageName: string, state: LicensingState, buildDate: Date): PackageManifest;
  validatePackage(state: LicensingState, encryptionLevel: EncryptionLevel): ValidationCheckResult[];
}

export class LicensingUnavailableError extends Error {
  constructor(operation: string) {
    super(`Licensing system is not available (${operation})`);
    this.name = 'LicensingUnavailableError';
  }
}
