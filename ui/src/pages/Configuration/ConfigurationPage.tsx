import React, { useState } from 'react';
import toast from 'react-hot-toast';
import { useAppDispatch, useAppSelector } from '../../store/configureStore';
import { resetLicensing, setAutoRenewal } from '../../store/Licensing/slice';
import { PLAN_CATALOG, PLAN_NAMES, PlanName } from '../../constants/plans';
import { formatCredits } from '../../utils/licensingStatus';

interface NotificationPreferences {
  usageAlerts: boolean;
  billingReminders: boolean;
  securityUpdates: boolean;
}

const NOTIFICATION_LABELS: Record<keyof NotificationPreferences, string> = {
  usageAlerts: 'Usage threshold alerts',
  billingReminders: 'Billing reminders',
  securityUpdates: 'Security update notifications',
};

const NOTIFICATION_KEYS: Array<keyof NotificationPreferences> = ['usageAlerts', 'billingReminders', 'securityUpdates'];

const QUICK_ACTIONS = [
  { label: '💳 Update Payment', message: 'Redirecting to secure payment portal...' },
  { label: '📄 Download Invoice', message: 'Generating invoice PDF...' },
  { label: '👥 Manage Users', message: 'Opening user management panel...' },
  { label: '📞 Contact Support', message: 'Support ticket created. Response within 4 hours.' },
];

const ConfigurationPage: React.FC = () => {
  const dispatch = useAppDispatch();
  const licensing = useAppSelector(s => s.Licensing);
  const [notifications, setNotifications] = useState<NotificationPreferences>({
    usageAlerts: true,
    billingReminders: true,
    securityUpdates: true,
  });

  const handleUpgrade = (plan: PlanName) => {
    console.info('[MigrationSuite][Configuration] upgrade requested', { from: licensing.subscriptionTier, to: plan });
    toast.success(`Upgrade request submitted for ${plan}`);
  };

  const handleResetSession = () => {
    dispatch(resetLicensing());
    console.info('[MigrationSuite][Configuration] session reset to defaults');
    toast.success('Session reset to default license settings');
  };

  return (
    <div className="grid grid-cols-1 md:grid-cols-2 gap-6 text-sm text-slate-200" data-testid="configuration-page">
      <div className="space-y-2">
        <h4 className="font-semibold text-slate-300">Subscription Management</h4>
        {PLAN_NAMES.map(plan => {
          const details = PLAN_CATALOG[plan];
          const isCurrent = plan === licensing.subscriptionTier;
          return (
            <details key={plan} className="bg-slate-800/60 border border-slate-700 rounded-lg p-3" data-testid={`plan-${plan}`}>
              <summary className="cursor-pointer font-medium">
                {plan} - ${formatCredits(details.price)}/month ({isCurrent ? '✅ Current' : 'Available'})
              </summary>
              <div className="mt-2 space-y-1">
                <p><strong>Monthly Credits:</strong> {formatCredits(details.credits)}</p>
                <p><strong>Max Users:</strong> {details.users}</p>
                <p><strong>Features:</strong> {details.features}</p>
                {!isCurrent && (
                  <button
                    type="button"
                    onClick={() => handleUpgrade(plan)}
                    className="mt-2 px-3 py-1 rounded bg-blue-600 hover:bg-blue-500 text-white"
                  >
                    Upgrade to {plan}
                  </button>
                )}
              </div>
            </details>
          );
        })}
      </div>

      <div className="space-y-3">
        <h4 className="font-semibold text-slate-300">Account Management</h4>
        <label className="block" title="Automatically renew subscription">
          <input
            type="checkbox"
            className="mr-2"
            checked={licensing.autoRenewal}
            onChange={e => dispatch(setAutoRenewal(e.target.checked))}
          />
          Auto-Renewal Enabled
        </label>

        <p className="font-semibold">Notification Preferences:</p>
        {NOTIFICATION_KEYS.map(key => (
          <label key={key} className="block">
            <input
              type="checkbox"
              className="mr-2"
              checked={notifications[key]}
              onChange={e => setNotifications(prev => ({ ...prev, [key]: e.target.checked }))}
            />
            {NOTIFICATION_LABELS[key]}
          </label>
        ))}

        <h4 className="font-semibold text-slate-300 pt-2">Quick Actions</h4>
        <div className="grid grid-cols-2 gap-2">
          {QUICK_ACTIONS.map(action => (
            <button
              key={action.label}
              type="button"
              onClick={() => toast(action.message, { icon: 'ℹ️' })}
              className="px-3 py-2 rounded bg-slate-700 hover:bg-slate-600"
            >
              {action.label}
            </button>
          ))}
        </div>
        <button
          type="button"
          onClick={handleResetSession}
          className="w-full px-3 py-2 rounded border border-slate-600 text-slate-300 hover:bg-slate-800"
        >
          🔄 Reset Session
        </button>
      </div>
    </div>
  );
};

export default ConfigurationPage;
