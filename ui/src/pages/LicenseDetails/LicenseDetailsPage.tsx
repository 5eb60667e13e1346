import React from 'react';
import classNames from 'classnames';
import { useAppSelector } from '../../store/configureStore';
import { useSessionServices } from '../../contexts/SessionServicesContext';
import { FEATURE_CATEGORIES, FEATURE_CATEGORY_NAMES, FeatureName } from '../../constants/features';
import { daysUntilExpiry, expiryHealth, ExpiryHealth, formatCredits } from '../../utils/licensingStatus';

const HEALTH_STYLES: Record<ExpiryHealth, string> = {
  ok: 'bg-emerald-900/40 border-emerald-700 text-emerald-200',
  expiring: 'bg-amber-900/40 border-amber-700 text-amber-200',
  expired: 'bg-red-900/40 border-red-700 text-red-200',
};

const healthMessage = (health: ExpiryHealth, days: number): string => {
  switch (health) {
    case 'ok':
      return `✅ License expires in ${days} days`;
    case 'expiring':
      return `⚠️ License expires in ${days} days`;
    case 'expired':
      return '❌ License has expired';
  }
};

const LicenseDetailsPage: React.FC = () => {
  const licensing = useAppSelector(s => s.Licensing);
  const { now } = useSessionServices();
  const days = daysUntilExpiry(licensing.licenseExpiry, now());
  const health = expiryHealth(days);
  const enabled = new Set<FeatureName>(licensing.featuresEnabled);

  const details: Array<[string, string]> = [
    ['License Type', licensing.licenseType],
    ['Organization', licensing.organization],
    ['Valid Until', licensing.licenseExpiry],
    ['Max Users', String(licensing.maxUsers)],
    ['Monthly Credits', formatCredits(licensing.monthlyCredits)],
  ];

  return (
    <div className="grid grid-cols-1 md:grid-cols-3 gap-6" data-testid="license-details-page">
      <div className="space-y-3">
        <h4 className="text-sm font-semibold text-slate-300">Basic Details</h4>
        <dl className="space-y-1 text-sm">
          {details.map(([label, value]) => (
            <div key={label} className="flex gap-2">
              <dt className="font-semibold text-slate-300">{label}:</dt>
              <dd className="text-slate-200">{value}</dd>
            </div>
          ))}
        </dl>
        <div className={classNames('border rounded-lg p-3 text-sm', HEALTH_STYLES[health])} data-testid="license-health">
          {healthMessage(health, days)}
        </div>
      </div>

      <div className="md:col-span-2 space-y-4">
        <h4 className="text-sm font-semibold text-slate-300">Enabled Features</h4>
        {FEATURE_CATEGORY_NAMES.map(category => {
          const features: readonly FeatureName[] = FEATURE_CATEGORIES[category];
          return (
            <div key={category}>
              <p className="font-semibold text-slate-200 mb-1">{category}:</p>
              <ul className="text-sm space-y-0.5">
                {features.map(feature => (
                  <li key={feature} className={enabled.has(feature) ? 'text-slate-200' : 'text-slate-500'}>
                    {enabled.has(feature) ? `✅ ${feature}` : `❌ ${feature} (Not included)`}
                  </li>
                ))}
              </ul>
            </div>
          );
        })}
      </div>
    </div>
  );
};

export default LicenseDetailsPage;
