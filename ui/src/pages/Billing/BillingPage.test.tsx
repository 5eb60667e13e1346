import React from 'react';
import { screen } from '@testing-library/react';
import '@testing-library/jest-dom';
import BillingPage from './BillingPage';
import { initialLicensingState } from '../../store/Licensing/types';
import { renderWithSession } from '../../testUtils/renderWithSession';

describe('BillingPage', () => {
  it('shows the current bill', () => {
    renderWithSession(<BillingPage />);
    expect(screen.getByText('Monthly Total').nextSibling).toHaveTextContent('$2,450.00');
    expect(screen.getByText('Next Bill Date').nextSibling).toHaveTextContent('Dec 1, 2025');
    expect(screen.getByText('Payment Method').nextSibling).toHaveTextContent('•••• 4567');
  });

  it('lists each line item with its share of the total', () => {
    renderWithSession(<BillingPage />);
    const row = screen.getByText('Base Subscription').closest('tr');
    expect(row).toHaveTextContent('$1,200.00');
    expect(row).toHaveTextContent('46.2%');
  });

  it('summarizes the usage trend', () => {
    renderWithSession(<BillingPage />);
    expect(screen.getByTestId('usage-summary')).toHaveTextContent('84 days • 34,604 credits total • peak 768/day');
  });

  it('flags high usage at the default allowance', () => {
    renderWithSession(<BillingPage />);
    expect(screen.getByRole('alert')).toHaveTextContent('⚠️ High credit usage detected');
  });

  it('flags a nearly exhausted allowance', () => {
    renderWithSession(<BillingPage />, {
      preloadedState: { Licensing: { ...initialLicensingState, usedCredits: 9500 } },
    });
    expect(screen.getByRole('alert')).toHaveTextContent('⚠️ Credit limit almost reached!');
  });

  it('shows no alert under normal usage', () => {
    renderWithSession(<BillingPage />, {
      preloadedState: { Licensing: { ...initialLicensingState, usedCredits: 5000 } },
    });
    expect(screen.queryByRole('alert')).not.toBeInTheDocument();
  });
});
