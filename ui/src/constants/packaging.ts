/**
 * Fixed values used by the demo package generator.
 * Signature and checksum are placeholders; nothing is computed from package contents.
 */

export const PACKAGE_VERSION = '2.1.0';

export const DEFAULT_PACKAGE_NAME = 'Migration_Suite_v2.1';

export const PLACEHOLDER_SIGNATURE = 'SHA256:abc123...';

export const PLACEHOLDER_CHECKSUM = 'sha256:demo_checksum_value';

export const PACKAGE_MIME_TYPE = 'application/json';

/** Size estimates in MB */
export const BASE_PACKAGE_SIZE_MB = 50;

export const MODULE_SIZES_MB = {
  foundation: 25,
  employee: 30,
  payroll: 20,
} as const;

export type ModuleName = keyof typeof MODULE_SIZES_MB;

export const MODULE_NAMES: ModuleName[] = ['foundation', 'employee', 'payroll'];

export const ENCRYPTION_LEVELS = ['AES-256', 'AES-128', 'RSA-2048'] as const;

export type EncryptionLevel = typeof ENCRYPTION_LEVELS[number];

export const DEPLOYMENT_TARGETS = ['Cloud (Auto-Update)', 'On-Premise', 'Hybrid', 'Custom'] as const;

export type DeploymentTarget = typeof DEPLOYMENT_TARGETS[number];

export const VALIDATION_CHECKS = [
  'Digital Signature',
  'Encryption',
  'Dependencies',
  'License',
  'Checksum',
  'Module Integrity',
] as const;

export type ValidationCheckName = typeof VALIDATION_CHECKS[number];

export const SYSTEM_REQUIREMENTS = {
  node_version: '>=20',
  memory: '4GB RAM minimum',
  storage: '500MB available space',
  dependencies: ['react>=18.3.0', '@reduxjs/toolkit>=2.2.0', 'date-fns>=3.6.0'],
};
