import React from 'react';
import { useAppDispatch, useAppSelector } from '../../store/configureStore';
import { navigate } from '../../store/Navigation/slice';
import { DETAIL_PAGE_IDS } from '../../store/Navigation/types';
import { useSessionServices } from '../../contexts/SessionServicesContext';
import { useSystemsStatus } from '../../hooks/useSystemsStatus';
import { DETAIL_PAGES } from '../../constants/pages';
import SystemStatusGrid from '../../components/SystemStatus/SystemStatusGrid';
import LicenseSummaryCards from '../../components/Licensing/LicenseSummaryCards';
import LicenseAlerts from '../../components/Licensing/LicenseAlerts';

const PLACEHOLDER_TOOLS = [
  { label: '📊 Analytics Dashboard', caption: 'Cross-System Analytics • KPIs • Reports' },
  { label: '🛠️ System Administration', caption: 'User Management • System Config • Audit Logs' },
];

const MainPage: React.FC = () => {
  const dispatch = useAppDispatch();
  const { config } = useSessionServices();
  const licensingState = useAppSelector(s => s.Licensing);
  const systems = useSystemsStatus();
  const licensingAvailable = systems.licensing.available;

  return (
    <div className="container mx-auto px-4 py-6 space-y-6" data-testid="main-page">
      <SystemStatusGrid status={systems} />

      {licensingAvailable && <LicenseSummaryCards licensing={licensingState} />}

      <LicenseAlerts status={systems.licensing} lowCreditThreshold={config.lowCreditThreshold} />

      <section>
        <h3 className="text-lg font-semibold text-white mb-3">🏢 Enterprise Management</h3>
        <div className="grid grid-cols-1 md:grid-cols-4 gap-4">
          {DETAIL_PAGE_IDS.map(page => {
            const definition = DETAIL_PAGES[page];
            const disabled = definition.requiresLicensingModule && !licensingAvailable;
            return (
              <div key={page}>
                <button
                  type="button"
                  onClick={() => dispatch(navigate(page))}
                  disabled={disabled}
                  className="w-full px-4 py-3 rounded-lg bg-slate-700 hover:bg-slate-600 text-white text-sm font-medium disabled:opacity-40 disabled:cursor-not-allowed"
                >
                  {definition.buttonLabel}
                </button>
                <p className="text-xs text-slate-400 mt-1">{definition.caption}</p>
              </div>
            );
          })}
        </div>
      </section>

      <section>
        <div className="grid grid-cols-1 md:grid-cols-2 gap-4">
          {PLACEHOLDER_TOOLS.map(tool => (
            <div key={tool.label}>
              <button
                type="button"
                disabled
                title="Coming soon"
                className="w-full px-4 py-3 rounded-lg bg-slate-800 text-slate-400 text-sm disabled:opacity-40 disabled:cursor-not-allowed"
              >
                {tool.label}
              </button>
              <p className="text-xs text-slate-500 mt-1">{tool.caption}</p>
            </div>
          ))}
        </div>
      </section>
    </div>
  );
};

export default MainPage;
