/**
 * Runtime configuration, read once from environment variables at startup.
 */
import * as z from 'zod';
import { CoreSystemName, isCoreSystemName } from '../constants/systems';

const envSchema = z.object({
  MIGRATION_SUITE_LICENSING_ENABLED: z
    .string()
    .default('true')
    .transform(value => value.trim().toLowerCase() === 'true'),
  MIGRATION_SUITE_GENERATION_LATENCY_MS: z.coerce.number().int().min(0).default(2000),
  MIGRATION_SUITE_VALIDATION_LATENCY_MS: z.coerce.number().int().min(0).default(1500),
  MIGRATION_SUITE_ONLINE_SYSTEMS: z.string().default('foundation,employee,payroll'),
  MIGRATION_SUITE_LOW_CREDIT_THRESHOLD: z.coerce.number().int().default(500),
});

export interface AppConfig {
  /** Selects the working licensing module; otherwise the unavailable one is used */
  licensingEnabled: boolean;
  generationLatencyMs: number;
  validationLatencyMs: number;
  onlineSystems: CoreSystemName[];
  lowCreditThreshold: number;
}

export const parseSystemList = (value: string): CoreSystemName[] =>
  value
    .split(',')
    .map(name => name.trim().toLowerCase())
    .filter(isCoreSystemName);

export type AppEnvironment = Partial<Record<keyof z.input<typeof envSchema>, string>>;

// Each key is read on its own so bundlers that substitute `process.env.X` can inline it
export const readAppEnvironment = (): AppEnvironment => ({
  MIGRATION_SUITE_LICENSING_ENABLED: process.env.MIGRATION_SUITE_LICENSING_ENABLED,
  MIGRATION_SUITE_GENERATION_LATENCY_MS: process.env.MIGRATION_SUITE_GENERATION_LATENCY_MS,
  MIGRATION_SUITE_VALIDATION_LATENCY_MS: process.env.MIGRATION_SUITE_VALIDATION_LATENCY_MS,
  MIGRATION_SUITE_ONLINE_SYSTEMS: process.env.MIGRATION_SUITE_ONLINE_SYSTEMS,
  MIGRATION_SUITE_LOW_CREDIT_THRESHOLD: process.env.MIGRATION_SUITE_LOW_CREDIT_THRESHOLD,
});

export function loadAppConfig(env: AppEnvironment): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    console.error('[MigrationSuite][Config] invalid configuration', problems);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  const values = parsed.data;
  const config: AppConfig = {
    licensingEnabled: values.MIGRATION_SUITE_LICENSING_ENABLED,
    generationLatencyMs: values.MIGRATION_SUITE_GENERATION_LATENCY_MS,
    validationLatencyMs: values.MIGRATION_SUITE_VALIDATION_LATENCY_MS,
    onlineSystems: parseSystemList(values.MIGRATION_SUITE_ONLINE_SYSTEMS),
    lowCreditThreshold: values.MIGRATION_SUITE_LOW_CREDIT_THRESHOLD,
  };
  console.info('[MigrationSuite][Config] loaded', config);
  return config;
}
