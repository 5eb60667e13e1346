/**
 * Migration tools that report their own availability next to the licensing system.
 */

export const CORE_SYSTEMS = ['foundation', 'employee', 'payroll'] as const;

export type CoreSystemName = typeof CORE_SYSTEMS[number];

export type SystemName = CoreSystemName | 'licensing';

export const SYSTEM_LABELS: Record<SystemName, string> = {
  foundation: 'Foundation System',
  employee: 'Employee System',
  payroll: 'Payroll System',
  licensing: 'Licensing System',
};

export const SYSTEM_CAPTIONS: Record<CoreSystemName, string> = {
  foundation: 'Organizational Hierarchy • HRP1000/HRP1001',
  employee: 'Personnel Information • PA0001/PA0002/PA0006/PA0105',
  payroll: 'Compensation Processing • PA0008/PA0014',
};

export function isCoreSystemName(value: string): value is CoreSystemName {
  return CORE_SYSTEMS.some(name => name === value);
}
