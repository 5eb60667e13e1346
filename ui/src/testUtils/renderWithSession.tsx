import React, { ReactElement } from 'react';
import { render } from '@testing-library/react';
import { Provider } from 'react-redux';
import configureAppStore, { PartialRootState } from '../store/configureStore';
import { SessionServicesProvider } from '../contexts/SessionServicesContext';
import { createSessionServices, SessionServices } from '../services/session';
import { AppConfig } from '../utils/appConfig';
import { LicensingModule } from '../services/licensing';

// Local time, so day counts do not depend on the machine's timezone
export const FROZEN_NOW = new Date(2025, 10, 15, 12, 0, 0);

export const testConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  licensingEnabled: true,
  generationLatencyMs: 0,
  validationLatencyMs: 0,
  onlineSystems: ['foundation', 'employee', 'payroll'],
  lowCreditThreshold: 500,
  ...overrides,
});

export const createTestServices = (
  configOverrides: Partial<AppConfig> = {},
  licensing?: LicensingModule,
): SessionServices =>
  createSessionServices(testConfig(configOverrides), { now: () => FROZEN_NOW, ...(licensing ? { licensing } : {}) });

interface RenderOptions {
  services?: SessionServices;
  preloadedState?: PartialRootState;
}

export function renderWithSession(ui: ReactElement, { services = createTestServices(), preloadedState }: RenderOptions = {}) {
  const store = configureAppStore(services, preloadedState);
  const result = render(
    <Provider store={store}>
      <SessionServicesProvider services={services}>{ui}</SessionServicesProvider>
    </Provider>
  );
  return { store, services, ...result };
}
