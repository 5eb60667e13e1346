import { differenceInDays, parseISO } from 'date-fns';
import { LicensingState } from '../store/Licensing/types';

export interface AvailableLicensingStatus {
  available: true;
  licenseValid: boolean;
  subscriptionTier: string;
  /** Not clamped: negative once usage exceeds the monthly allowance */
  creditsRemaining: number;
  usersActive: number;
}

export type LicensingSystemStatus = AvailableLicensingStatus | { available: false };

export type CreditUsageAlert = 'critical' | 'high' | 'normal';

export type ExpiryHealth = 'ok' | 'expiring' | 'expired';

export function getLicensingStatus(state: LicensingState): AvailableLicensingStatus {
  return {
    available: true,
    licenseValid: state.licenseValid,
    subscriptionTier: state.subscriptionTier,
    creditsRemaining: state.monthlyCredits - state.usedCredits,
    usersActive: state.currentUsers,
  };
}

export function creditUsagePercent(state: LicensingState): number {
  if (state.monthlyCredits <= 0) return 0;
  return (state.usedCredits / state.monthlyCredits) * 100;
}

export function creditUsageAlert(usagePercent: number): CreditUsageAlert {
  if (usagePercent > 90) return 'critical';
  if (usagePercent > 75) return 'high';
  return 'normal';
}

/**
 * Whole days from `now` until the expiry date (local midnight), truncated toward zero.
 */
export function daysUntilExpiry(licenseExpiry: string, now: Date): number {
  return differenceInDays(parseISO(licenseExpiry), now);
}

export function expiryHealth(daysRemaining: number): ExpiryHealth {
  if (daysRemaining > 30) return 'ok';
  if (daysRemaining > 0) return 'expiring';
  return 'expired';
}

export const formatCredits = (value: number): string => value.toLocaleString('en-US');

export const formatCurrency = (value: number): string =>
  `$${value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
