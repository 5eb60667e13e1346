import React from 'react';
import { fireEvent, screen } from '@testing-library/react';
import '@testing-library/jest-dom';
import App from './App';
import { renderWithSession } from './testUtils/renderWithSession';

jest.mock('react-hot-toast', () => {
  const toast = Object.assign(jest.fn(), { success: jest.fn(), error: jest.fn() });
  return { __esModule: true, default: toast, Toaster: () => null };
});

describe('App', () => {
  beforeEach(() => {
    window.history.replaceState(null, '', '/');
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('renders the console with the licensing footer', () => {
    renderWithSession(<App />);
    expect(screen.getByText('🔐 License & Subscription Management')).toBeInTheDocument();
    expect(screen.getByTestId('main-page')).toBeInTheDocument();
    expect(screen.getByText('License: Enterprise Plus')).toBeInTheDocument();
    expect(screen.getByText('Credits Remaining: 1,500')).toBeInTheDocument();
  });

  it('keeps the URL hash in step with the current page', () => {
    renderWithSession(<App />);
    expect(window.location.hash).toBe('#/');

    fireEvent.click(screen.getByText('⚙️ Configuration'));
    expect(window.location.hash).toBe('#/configuration');

    fireEvent.click(screen.getByText('← Back to Main'));
    expect(window.location.hash).toBe('#/');
  });
});
