import { getLicensingStatus } from '../../utils/licensingStatus';
import { buildPackageContents, buildPackageManifest, stubValidatePackage } from '../../utils/packaging';
import { LicensingModule } from './types';

export const mockLicensingModule: LicensingModule = {
  available: true,
  getSystemStatus: getLicensingStatus,
  buildPackage: buildPackageContents,
  buildManifest: buildPackageManifest,
  validatePackage: stubValidatePackage,
};
