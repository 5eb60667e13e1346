import React, { useEffect } from 'react';
import { Toaster } from 'react-hot-toast';
import { useAppSelector } from './store/configureStore';
import { useSessionServices } from './contexts/SessionServicesContext';
import { useSystemsStatus } from './hooks/useSystemsStatus';
import { hashForLocation } from './utils/pageHash';
import PageRouter from './components/PageRouter/PageRouter';
import AppFooter from './components/Footer/AppFooter';

const App: React.FC = () => {
    const location = useAppSelector(s => s.Navigation.location);
    const { now } = useSessionServices();
    const systems = useSystemsStatus();

    useEffect(() => {
        console.info('[MigrationSuite][App] mounted');
        return () => console.info('[MigrationSuite][App] unmounted');
    }, []);

    // Keep the URL hash in step with the current page so views can be bookmarked
    useEffect(() => {
        const hash = hashForLocation(location);
        if (window.location.hash !== hash) {
            window.history.replaceState(null, '', hash);
        }
    }, [location]);

    return (
        <div className="min-h-screen flex flex-col bg-slate-950">
            <header className="bg-slate-900 border-b border-slate-700">
                <div className="container mx-auto px-4 py-4">
                    <h1 className="text-2xl font-bold text-white">🔐 License & Subscription Management</h1>
                    <p className="text-sm text-slate-400">Migration Suite • Enterprise Console</p>
                </div>
            </header>
            <main className="flex-grow">
                <PageRouter />
            </main>
            <AppFooter licensing={systems.licensing} year={now().getFullYear()} />
            <Toaster position="top-right" />
        </div>
    );
};

export default App;
