import React, { createContext, useContext, ReactNode } from 'react';
import { SessionServices } from '../services/session';

const SessionServicesContext = createContext<SessionServices | undefined>(undefined);

interface SessionServicesProviderProps {
    children: ReactNode;
    services: SessionServices;
}

export const SessionServicesProvider: React.FC<SessionServicesProviderProps> = ({ children, services }) => (
    <SessionServicesContext.Provider value={services}>
        {children}
    </SessionServicesContext.Provider>
);

export const useSessionServices = (): SessionServices => {
    const context = useContext(SessionServicesContext);
    if (context === undefined) {
        throw new Error('useSessionServices must be used within a SessionServicesProvider');
    }
    return context;
};
