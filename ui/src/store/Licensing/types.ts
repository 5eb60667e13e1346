import { ALL_FEATURES, FeatureName } from '../../constants/features';
import { PlanName } from '../../constants/plans';

export interface LicensingState {
  licenseType: string;
  licenseValid: boolean;
  licenseExpiry: string; // YYYY-MM-DD
  organization: string;
  maxUsers: number;
  currentUsers: number;
  monthlyCredits: number;
  usedCredits: number;
  subscriptionTier: PlanName;
  monthlyCost: number;
  autoRenewal: boolean;
  // kept as an array so the store stays serializable; treated as a set
  featuresEnabled: FeatureName[];
}

export const initialLicensingState: LicensingState = {
  licenseType: 'Enterprise',
  licenseValid: true,
  licenseExpiry: '2025-12-31',
  organization: 'Global Corp Inc.',
  maxUsers: 25,
  currentUsers: 15,
  monthlyCredits: 10000,
  usedCredits: 8500,
  subscriptionTier: 'Enterprise Plus',
  monthlyCost: 2450.0,
  autoRenewal: true,
  featuresEnabled: [...ALL_FEATURES],
};
