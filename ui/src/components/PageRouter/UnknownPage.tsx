import React from 'react';
import BackButton from '../Layout/BackButton';

interface UnknownPageProps {
  requested: string;
}

const UnknownPage: React.FC<UnknownPageProps> = ({ requested }) => (
  <div className="container mx-auto px-4 py-6 space-y-4" data-testid="unknown-page">
    <BackButton />
    <div className="bg-amber-900/40 border border-amber-700 text-amber-200 rounded-lg p-4">
      <p className="font-semibold">Page not found</p>
      <p className="text-sm mt-1">
        No view is registered for <code className="font-mono">{requested}</code>.
      </p>
    </div>
  </div>
);

export default UnknownPage;
