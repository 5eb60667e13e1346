import { useMemo } from 'react';
import { useAppSelector } from '../store/configureStore';
import { useSessionServices } from '../contexts/SessionServicesContext';
import { checkAllSystemStatus, SystemsStatus } from '../utils/systemStatus';
import { CoreSystemName } from '../constants/systems';

/**
 * Status of every integrated system for the current session, recomputed when the
 * licensing state changes.
 */
export const useSystemsStatus = (): SystemsStatus => {
  const { config, licensing } = useSessionServices();
  const licensingState = useAppSelector(s => s.Licensing);

  return useMemo(() => {
    const coreProbe = (name: CoreSystemName) => () => ({ available: config.onlineSystems.includes(name) });
    return checkAllSystemStatus({
      foundation: coreProbe('foundation'),
      employee: coreProbe('employee'),
      payroll: coreProbe('payroll'),
      // The unavailable module would only throw; report it offline without calling it
      licensing: () => (licensing.available ? licensing.getSystemStatus(licensingState) : { available: false }),
    });
  }, [config, licensing, licensingState]);
};
