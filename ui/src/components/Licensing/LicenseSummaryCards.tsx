import React from 'react';
import { LicensingState } from '../../store/Licensing/types';
import { creditUsagePercent, formatCredits } from '../../utils/licensingStatus';

interface LicenseSummaryCardsProps {
  licensing: LicensingState;
}

interface SummaryCard {
  label: string;
  value: string;
  detail?: string;
  help: string;
}

const LicenseSummaryCards: React.FC<LicenseSummaryCardsProps> = ({ licensing }) => {
  const cards: SummaryCard[] = [
    {
      label: 'License Status',
      value: licensing.licenseValid ? '🟢 Active' : '🔴 Expired',
      help: `Valid until ${licensing.licenseExpiry}`,
    },
    {
      label: 'Subscription Tier',
      value: licensing.subscriptionTier,
      help: 'Current subscription level',
    },
    {
      label: 'Credit Usage',
      value: `${creditUsagePercent(licensing).toFixed(1)}%`,
      detail: `${formatCredits(licensing.usedCredits)}/${formatCredits(licensing.monthlyCredits)}`,
      help: 'Monthly processing credits',
    },
    {
      label: 'Active Users',
      value: `${licensing.currentUsers}/${licensing.maxUsers}`,
      help: 'Current vs maximum licensed users',
    },
  ];

  return (
    <div className="grid grid-cols-2 md:grid-cols-4 gap-4" data-testid="license-summary">
      {cards.map(card => (
        <div key={card.label} className="bg-slate-800/60 border border-slate-700 rounded-lg p-4" title={card.help}>
          <div className="text-xs text-slate-400 mb-1">{card.label}</div>
          <div className="text-lg font-semibold text-white">{card.value}</div>
          {card.detail && <div className="text-xs text-slate-400 mt-1">{card.detail}</div>}
        </div>
      ))}
    </div>
  );
};

export default LicenseSummaryCards;
