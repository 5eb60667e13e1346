import React from 'react';

const UnavailableNotice: React.FC = () => (
  <div className="space-y-3" data-testid="licensing-unavailable">
    <div className="bg-red-900/40 border border-red-700 text-red-200 rounded-lg p-4">
      ❌ Licensing system is not available
    </div>
    <div className="bg-slate-800/60 border border-slate-700 rounded-lg p-4 text-sm text-slate-300">
      <p className="font-semibold mb-2">Troubleshooting:</p>
      <ol className="list-decimal list-inside space-y-1">
        <li>Check that MIGRATION_SUITE_LICENSING_ENABLED is not set to false</li>
        <li>Ensure the licensing module is included in this build</li>
        <li>Reload the page to start a new session</li>
      </ol>
    </div>
  </div>
);

export default UnavailableNotice;
