import React, { useMemo } from 'react';
import classNames from 'classnames';
import { useAppSelector } from '../../store/configureStore';
import { useSessionServices } from '../../contexts/SessionServicesContext';
import {
  BILLING_BREAKDOWN,
  PAYMENT_METHOD_MASK,
  USAGE_TREND_END,
  USAGE_TREND_START,
} from '../../constants/billing';
import { creditUsageAlert, creditUsagePercent, formatCredits, formatCurrency } from '../../utils/licensingStatus';
import { buildDailyUsage, nextBillDate } from '../../utils/usageTrend';

const BillingPage: React.FC = () => {
  const licensing = useAppSelector(s => s.Licensing);
  const { now } = useSessionServices();
  const usageAlert = creditUsageAlert(creditUsagePercent(licensing));
  const totalCost = BILLING_BREAKDOWN.reduce((sum, item) => sum + item.cost, 0);
  const usage = useMemo(() => buildDailyUsage(USAGE_TREND_START, USAGE_TREND_END), []);
  const peak = Math.max(...usage.map(day => day.creditsUsed));
  const total = usage.length > 0 ? usage[usage.length - 1].cumulative : 0;

  return (
    <div className="space-y-6" data-testid="billing-page">
      <div className="grid grid-cols-1 md:grid-cols-3 gap-6">
        <div className="md:col-span-2">
          <h4 className="text-sm font-semibold text-slate-300 mb-2">Monthly Cost Breakdown</h4>
          <table className="w-full text-sm text-slate-200">
            <thead>
              <tr className="text-left text-slate-400">
                <th className="py-1">Service</th>
                <th className="py-1">Cost</th>
                <th className="py-1">Usage</th>
                <th className="py-1">Share</th>
              </tr>
            </thead>
            <tbody>
              {BILLING_BREAKDOWN.map(item => (
                <tr key={item.service} className="border-t border-slate-700">
                  <td className="py-1">{item.service}</td>
                  <td className="py-1">{formatCurrency(item.cost)}</td>
                  <td className="py-1">{item.usage}</td>
                  <td className="py-1">{((item.cost / totalCost) * 100).toFixed(1)}%</td>
                </tr>
              ))}
            </tbody>
          </table>
        </div>

        <div className="space-y-3">
          <h4 className="text-sm font-semibold text-slate-300">Current Bill</h4>
          <dl className="text-sm space-y-1">
            <div className="flex justify-between"><dt className="text-slate-400">Monthly Total</dt><dd className="text-white">{formatCurrency(licensing.monthlyCost)}</dd></div>
            <div className="flex justify-between"><dt className="text-slate-400">Next Bill Date</dt><dd className="text-white">{nextBillDate(now())}</dd></div>
            <div className="flex justify-between"><dt className="text-slate-400">Payment Method</dt><dd className="text-white">{PAYMENT_METHOD_MASK}</dd></div>
          </dl>
          {usageAlert === 'critical' && (
            <div className="bg-red-900/40 border border-red-700 text-red-200 rounded-lg p-3 text-sm" role="alert">
              ⚠️ Credit limit almost reached!
            </div>
          )}
          {usageAlert === 'high' && (
            <div className="bg-amber-900/40 border border-amber-700 text-amber-200 rounded-lg p-3 text-sm" role="alert">
              ⚠️ High credit usage detected
            </div>
          )}
        </div>
      </div>

      <div>
        <h4 className="text-sm font-semibold text-slate-300 mb-2">Usage Trends</h4>
        <p className="text-xs text-slate-400 mb-2" data-testid="usage-summary">
          {usage.length} days • {formatCredits(total)} credits total • peak {formatCredits(peak)}/day
        </p>
        <div className="space-y-0.5">
          {usage.map(day => (
            <div key={day.date} className="flex items-center gap-2 text-xs text-slate-400">
              <span className="w-20 font-mono">{day.date}</span>
              <div className="flex-1 bg-slate-800 rounded h-2">
                <div
                  className={classNames('h-2 rounded', day.creditsUsed === peak ? 'bg-amber-500' : 'bg-blue-500')}
                  style={{ width: `${(day.creditsUsed / peak) * 100}%` }}
                />
              </div>
              <span className="w-12 text-right">{day.creditsUsed}</span>
              <span className="w-16 text-right">{formatCredits(day.cumulative)}</span>
            </div>
          ))}
        </div>
      </div>
    </div>
  );
};

export default BillingPage;
