import { createSlice, PayloadAction } from '@reduxjs/toolkit';
import { initialNavigationState, isAtMain, MAIN_LOCATION, resolveLocation } from './types';

const slice = createSlice({
  name: 'Navigation',
  initialState: initialNavigationState,
  reducers: {
    // Detail pages are only reachable from main
    navigate: (state, action: PayloadAction<string>) => {
      const target = action.payload;
      if (!isAtMain(state.location)) {
        console.warn('[MigrationSuite][Navigation] navigate ignored outside main', { target });
        return;
      }
      if (target === 'main') {
        return;
      }
      state.location = resolveLocation(target);
      console.info('[MigrationSuite][Navigation] navigated', { location: state.location });
    },
    back: state => {
      if (isAtMain(state.location)) {
        return;
      }
      state.location = MAIN_LOCATION;
      console.info('[MigrationSuite][Navigation] back to main');
    },
  },
});

export const { navigate, back } = slice.actions;
export default slice.reducer;
