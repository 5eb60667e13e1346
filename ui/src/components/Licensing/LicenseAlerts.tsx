import React from 'react';
import { LicensingSystemStatus } from '../../utils/licensingStatus';

interface LicenseAlertsProps {
  status: LicensingSystemStatus;
  lowCreditThreshold: number;
}

const LicenseAlerts: React.FC<LicenseAlertsProps> = ({ status, lowCreditThreshold }) => {
  if (!status.available) return null;

  if (!status.licenseValid) {
    return (
      <div className="bg-red-900/40 border border-red-700 text-red-200 rounded-lg p-4" role="alert">
        ⚠️ <strong>License Issue:</strong> Your license has expired or is invalid. Please contact support.
      </div>
    );
  }
  if (status.creditsRemaining < lowCreditThreshold) {
    return (
      <div className="bg-amber-900/40 border border-amber-700 text-amber-200 rounded-lg p-4" role="alert">
        ⚠️ <strong>Low Credits:</strong> You're running low on processing credits. Consider upgrading your plan.
      </div>
    );
  }
  return null;
};

export default LicenseAlerts;
