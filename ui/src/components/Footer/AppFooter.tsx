import React from 'react';
import { LicensingSystemStatus, formatCredits } from '../../utils/licensingStatus';

interface AppFooterProps {
  licensing: LicensingSystemStatus;
  year: number;
}

export const AppFooter: React.FC<AppFooterProps> = ({ licensing, year }) => (
  <footer className="bg-slate-900 border-t border-slate-700 py-6 mt-auto" data-testid="app-footer">
    <div className="container mx-auto px-4 text-xs text-slate-400">
      {licensing.available ? (
        <div className="grid grid-cols-3 gap-4">
          <span>License: {licensing.subscriptionTier}</span>
          <span>Credits Remaining: {formatCredits(licensing.creditsRemaining)}</span>
          <span>Active Users: {licensing.usersActive}</span>
        </div>
      ) : (
        <span>Migration Suite © {year}</span>
      )}
    </div>
  </footer>
);

export default AppFooter;
