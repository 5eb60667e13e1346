import React from 'react';
import { createRoot } from 'react-dom/client';
import { Provider as ReduxProvider } from 'react-redux';

import configureAppStore, { getPreloadedState } from './store/configureStore';
import { SessionServicesProvider } from './contexts/SessionServicesContext';
import { createSessionServices } from './services/session';
import { loadAppConfig, readAppEnvironment } from './utils/appConfig';
import App from './App';

const config = loadAppConfig(readAppEnvironment());
const services = createSessionServices(config);
const store = configureAppStore(services, getPreloadedState(window.location.hash));

const rootElement = document.getElementById('root');
if (!rootElement) {
    throw new Error('Root element not found');
}

console.info('[MigrationSuite] starting', { licensing: services.licensing.available ? 'available' : 'unavailable' });

createRoot(rootElement).render(
    <React.StrictMode>
        <ReduxProvider store={store}>
            <SessionServicesProvider services={services}>
                <App />
            </SessionServicesProvider>
        </ReduxProvider>
    </React.StrictMode>
);
