export const FEATURE_CATEGORIES = {
  'Core Processing': [
    'Foundation Data Processing',
    'Employee Data Management',
    'Payroll Data Processing',
  ],
  'Advanced Analytics': [
    'Advanced Analytics',
    'Custom Reports',
    'API Access',
  ],
  'Enterprise Features': [
    'Priority Support',
    'Audit Trail',
    'Encrypted Packaging',
    'Multi-tenant Support',
  ],
} as const;

export type FeatureCategory = keyof typeof FEATURE_CATEGORIES;

export type FeatureName = typeof FEATURE_CATEGORIES[FeatureCategory][number];

export const ALL_FEATURES: FeatureName[] = Object.values(FEATURE_CATEGORIES).flat();

export const FEATURE_CATEGORY_NAMES: FeatureCategory[] = ['Core Processing', 'Advanced Analytics', 'Enterprise Features'];
