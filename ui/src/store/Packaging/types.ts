import { DeploymentTarget, EncryptionLevel } from '../../constants/packaging';
import { LicensingState } from '../Licensing/types';
import { ModuleFlags, PackageDownload, ValidationCheckResult } from '../../utils/packaging';

export interface PackageRequest {
  packageName: string;
  modules: ModuleFlags;
  security: {
    encrypt: boolean;
    digitalSignature: boolean;
    auditTrail: boolean;
    encryptionLevel: EncryptionLevel;
  };
  // display-only; not written into generated payloads
  deployment: {
    target: DeploymentTarget;
    autoUpdate: boolean;
    multiTenant: boolean;
    apiEnabled: boolean;
  };
}

export interface GeneratePackageArgs {
  request: PackageRequest;
  licensing: LicensingState;
}

export interface GenerateManifestArgs {
  packageName: string;
  licensing: LicensingState;
}

export interface ValidatePackageArgs {
  licensing: LicensingState;
  encryptionLevel: EncryptionLevel;
}

export interface PackagingState {
  generating: boolean;
  generatingManifest: boolean;
  validating: boolean;
  lastPackage?: PackageDownload;
  lastManifest?: PackageDownload;
  validationResults?: ValidationCheckResult[];
  lastError?: string;
}

export const initialPackagingState: PackagingState = {
  generating: false,
  generatingManifest: false,
  validating: false,
};
