import React, { ReactNode } from 'react';
import BackButton from './BackButton';

interface DetailPageLayoutProps {
  title: string;
  children: ReactNode;
}

const DetailPageLayout: React.FC<DetailPageLayoutProps> = ({ title, children }) => (
  <div className="container mx-auto px-4 py-6 space-y-6">
    <BackButton />
    <h2 className="text-xl font-semibold text-white">{title}</h2>
    {children}
  </div>
);

export default DetailPageLayout;
