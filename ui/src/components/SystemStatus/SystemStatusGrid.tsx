import React from 'react';
import classNames from 'classnames';
import { isCoreSystemName, SYSTEM_CAPTIONS, SYSTEM_LABELS, SystemName } from '../../constants/systems';
import { SystemsStatus } from '../../utils/systemStatus';

interface SystemStatusGridProps {
  status: SystemsStatus;
}

const ORDER: SystemName[] = ['foundation', 'employee', 'payroll', 'licensing'];

const SystemStatusGrid: React.FC<SystemStatusGridProps> = ({ status }) => (
  <div className="grid grid-cols-2 md:grid-cols-4 gap-4" data-testid="system-status-grid">
    {ORDER.map(name => {
      const available = status[name].available;
      return (
        <div
          key={name}
          className="bg-slate-800/60 border border-slate-700 rounded-lg p-4"
          data-testid={`system-status-${name}`}
        >
          <div className="text-xs text-slate-400 mb-1">{SYSTEM_LABELS[name]}</div>
          <div className={classNames('font-medium', available ? 'text-emerald-300' : 'text-red-300')}>
            {available ? '🟢 Online' : '🔴 Offline'}
          </div>
          {isCoreSystemName(name) && <div className="text-xs text-slate-500 mt-1">{SYSTEM_CAPTIONS[name]}</div>}
        </div>
      );
    })}
  </div>
);

export default SystemStatusGrid;
