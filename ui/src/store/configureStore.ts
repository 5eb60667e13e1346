import { configureStore } from '@reduxjs/toolkit';

import rootReducer from './rootReducer';

import getPreloadedState from './getPreloadedState';
import { useSelector, useDispatch } from 'react-redux';
import { SessionServices } from '../services/session';

export type RootState = ReturnType<typeof rootReducer>;

export type PartialRootState = Partial<RootState>;

// One store per session; the session's services reach thunks as their extra argument.
const configureAppStore = (services: SessionServices, preloadedState: PartialRootState = {}) => {
    const store = configureStore({
        reducer: rootReducer,
        preloadedState,
        middleware: (getDefault) => getDefault({ thunk: { extraArgument: services } }),
    });

    return store;
};

export type AppStore = ReturnType<typeof configureAppStore>;

export type AppDispatch = AppStore['dispatch'];

// Use throughout app instead of plain `useDispatch` and `useSelector`
// @see https://redux-toolkit.js.org/tutorials/typescript#define-typed-hooks
export const useAppDispatch = useDispatch.withTypes<AppDispatch>();
export const useAppSelector = useSelector.withTypes<RootState>();

export { getPreloadedState };

export default configureAppStore;
