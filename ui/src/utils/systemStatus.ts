import { CoreSystemName } from '../constants/systems';
import { LicensingSystemStatus } from './licensingStatus';

export interface SystemAvailability {
  available: boolean;
}

export type SystemsStatus = Record<CoreSystemName, SystemAvailability> & {
  licensing: LicensingSystemStatus;
};

export type SystemProbes = {
  [K in keyof SystemsStatus]: () => SystemsStatus[K];
};

const runProbe = <T extends SystemAvailability>(name: string, probe: () => T): T | { available: false } => {
  try {
    return probe();
  } catch (err) {
    console.warn(`[MigrationSuite][SystemStatus] ${name} probe failed`, err);
    return { available: false };
  }
};

/**
 * Check status of all integrated systems. A probe that throws is reported as unavailable.
 */
export function checkAllSystemStatus(probes: SystemProbes): SystemsStatus {
  return {
    foundation: runProbe('foundation', probes.foundation),
    employee: runProbe('employee', probes.employee),
    payroll: runProbe('payroll', probes.payroll),
    licensing: runProbe('licensing', probes.licensing),
  };
}
