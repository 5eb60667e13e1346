import {
  BASE_PACKAGE_SIZE_MB,
  EncryptionLevel,
  MODULE_NAMES,
  MODULE_SIZES_MB,
  ModuleName,
  PACKAGE_MIME_TYPE,
  PACKAGE_VERSION,
  PLACEHOLDER_CHECKSUM,
  PLACEHOLDER_SIGNATURE,
  SYSTEM_REQUIREMENTS,
  VALIDATION_CHECKS,
  ValidationCheckName,
} from '../constants/packaging';
import { LicensingState } from '../store/Licensing/types';

export type ModuleFlags = Record<ModuleName, boolean>;

export interface SecurityOptions {
  encrypted: boolean;
  encryptionLevel: EncryptionLevel;
}

export const DEFAULT_SECURITY: SecurityOptions = {
  encrypted: true,
  encryptionLevel: 'AES-256',
};

// Payload shapes use snake_case keys: they are written verbatim into the downloaded file.
export interface PackageContents {
  package_name: string;
  version: string;
  generated_at: string;
  components: {
    foundation_module: boolean;
    employee_module: boolean;
    payroll_module: boolean;
  };
  estimated_size_mb: number;
  security: {
    encrypted: boolean;
    encryption_level: EncryptionLevel;
    signature: string;
    checksum: string;
    placeholder: true;
  };
  license: {
    type: string;
    valid_until: string;
    organization: string;
  };
}

export interface PackageManifest {
  package_info: {
    name: string;
    version: string;
    build_date: string;
    license_type: string;
  };
  system_requirements: typeof SYSTEM_REQUIREMENTS;
  features: string[];
  checksum: string;
}

export interface PackageDownload {
  fileName: string;
  mimeType: typeof PACKAGE_MIME_TYPE;
  data: string;
}

export interface ValidationCheckResult {
  check: ValidationCheckName;
  result: string;
  passed: true;
}

export function estimatePackageSize(modules: ModuleFlags): number {
  return MODULE_NAMES.reduce(
    (total, name) => (modules[name] ? total + MODULE_SIZES_MB[name] : total),
    BASE_PACKAGE_SIZE_MB,
  );
}

export function countIncludedModules(modules: ModuleFlags): number {
  return MODULE_NAMES.filter(name => modules[name]).length;
}

export function buildPackageContents(
  packageName: string,
  modules: ModuleFlags,
  state: LicensingState,
  generatedAt: Date,
  security: SecurityOptions = DEFAULT_SECURITY,
): PackageContents {
  return {
    package_name: packageName,
    version: PACKAGE_VERSION,
    generated_at: generatedAt.toISOString(),
    components: {
      foundation_module: modules.foundation,
      employee_module: modules.employee,
      payroll_module: modules.payroll,
    },
    estimated_size_mb: estimatePackageSize(modules),
    security: {
      encrypted: security.encrypted,
      encryption_level: security.encryptionLevel,
      signature: PLACEHOLDER_SIGNATURE,
      checksum: PLACEHOLDER_CHECKSUM,
      placeholder: true,
    },
    license: {
      type: state.licenseType,
      valid_until: state.licenseExpiry,
      organization: state.organization,
    },
  };
}

export function buildPackageManifest(packageName: string, state: LicensingState, buildDate: Date): PackageManifest {
  return {
    package_info: {
      name: packageName,
      version: PACKAGE_VERSION,
      build_date: buildDate.toISOString(),
      license_type: state.licenseType,
    },
    system_requirements: SYSTEM_REQUIREMENTS,
    features: [...state.featuresEnabled],
    checksum: PLACEHOLDER_CHECKSUM,
  };
}

/**
 * Placeholder integrity check: every entry reports success and nothing is inspected.
 */
export function stubValidatePackage(state: LicensingState, encryptionLevel: EncryptionLevel = 'AES-256'): ValidationCheckResult[] {
  const results: Record<ValidationCheckName, string> = {
    'Digital Signature': 'Valid',
    Encryption: `${encryptionLevel} confirmed`,
    Dependencies: 'All satisfied',
    License: `Valid until ${state.licenseExpiry}`,
    Checksum: 'Verified',
    'Module Integrity': 'All modules intact',
  };
  return VALIDATION_CHECKS.map(check => ({ check, result: results[check], passed: true }));
}

export const serializePayload = (value: PackageContents | PackageManifest): string => JSON.stringify(value, null, 2);

export const manifestFileName = (packageName: string): string => `${packageName}_manifest.json`;

export function toPackageDownload(packageName: string, value: PackageContents | PackageManifest): PackageDownload {
  return {
    fileName: manifestFileName(packageName),
    mimeType: PACKAGE_MIME_TYPE,
    data: serializePayload(value),
  };
}
