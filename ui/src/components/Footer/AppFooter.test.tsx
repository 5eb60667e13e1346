import React from 'react';
import { render, screen } from '@testing-library/react';
import '@testing-library/jest-dom';
import AppFooter from './AppFooter';

describe('AppFooter', () => {
  it('summarizes the license when licensing is available', () => {
    render(
      <AppFooter
        licensing={{ available: true, licenseValid: true, subscriptionTier: 'Enterprise Plus', creditsRemaining: 1500, usersActive: 15 }}
        year={2025}
      />
    );
    expect(screen.getByText('License: Enterprise Plus')).toBeInTheDocument();
    expect(screen.getByText('Credits Remaining: 1,500')).toBeInTheDocument();
    expect(screen.getByText('Active Users: 15')).toBeInTheDocument();
  });

  it('falls back to the product line when licensing is unavailable', () => {
    render(<AppFooter licensing={{ available: false }} year={2025} />);
    expect(screen.getByTestId('app-footer')).toHaveTextContent('Migration Suite © 2025');
    expect(screen.queryByText(/Credits Remaining/)).not.toBeInTheDocument();
  });
});
