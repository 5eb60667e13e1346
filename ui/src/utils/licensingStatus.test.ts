import { initialLicensingState, LicensingState } from '../store/Licensing/types';
import {
  creditUsageAlert,
  creditUsagePercent,
  daysUntilExpiry,
  expiryHealth,
  formatCredits,
  formatCurrency,
  getLicensingStatus,
} from './licensingStatus';

const withState = (overrides: Partial<LicensingState>): LicensingState => ({ ...initialLicensingState, ...overrides });

describe('getLicensingStatus', () => {
  it('summarises the default session state', () => {
    expect(getLicensingStatus(initialLicensingState)).toEqual({
      available: true,
      licenseValid: true,
      subscriptionTier: 'Enterprise Plus',
      creditsRemaining: 1500,
      usersActive: 15,
    });
  });

  it('returns identical results for repeated calls and leaves the state untouched', () => {
    const state = withState({ usedCredits: 1234 });
    const snapshot = JSON.stringify(state);
    expect(getLicensingStatus(state)).toEqual(getLicensingStatus(state));
    expect(JSON.stringify(state)).toBe(snapshot);
  });

  it('reports negative remaining credits once usage exceeds the allowance', () => {
    const status = getLicensingStatus(withState({ monthlyCredits: 10000, usedCredits: 10500 }));
    expect(status.creditsRemaining).toBe(-500);
  });
});

describe('credit usage', () => {
  it('computes the usage percentage', () => {
    expect(creditUsagePercent(initialLicensingState)).toBe(85);
  });

  it('treats an empty allowance as zero usage', () => {
    expect(creditUsagePercent(withState({ monthlyCredits: 0, usedCredits: 20 }))).toBe(0);
  });

  it('grades usage above 90 and 75 percent', () => {
    expect(creditUsageAlert(90.5)).toBe('critical');
    expect(creditUsageAlert(90)).toBe('high');
    expect(creditUsageAlert(85)).toBe('high');
    expect(creditUsageAlert(75)).toBe('normal');
  });
});

describe('license expiry', () => {
  it('counts whole days until the expiry date', () => {
    expect(daysUntilExpiry('2025-12-31', new Date(2025, 11, 1, 12, 0, 0))).toBe(29);
  });

  it('is negative after expiry', () => {
    expect(daysUntilExpiry('2025-12-31', new Date(2026, 0, 5))).toBe(-5);
  });

  it('maps remaining days to a health level', () => {
    expect(expiryHealth(31)).toBe('ok');
    expect(expiryHealth(30)).toBe('expiring');
    expect(expiryHealth(1)).toBe('expiring');
    expect(expiryHealth(0)).toBe('expired');
    expect(expiryHealth(-3)).toBe('expired');
  });
});

describe('formatting', () => {
  it('groups thousands', () => {
    expect(formatCredits(10000)).toBe('10,000');
    expect(formatCredits(-500)).toBe('-500');
  });

  it('formats dollar amounts with cents', () => {
    expect(formatCurrency(2450)).toBe('$2,450.00');
  });
});
