import { createSlice, PayloadAction } from '@reduxjs/toolkit';
import { initialLicensingState } from './types';

const slice = createSlice({
  name: 'Licensing',
  initialState: initialLicensingState,
  reducers: {
    setAutoRenewal: (state, action: PayloadAction<boolean>) => {
      state.autoRenewal = action.payload;
    },
    // Session lost: start over from the documented defaults
    resetLicensing: () => initialLicensingState,
  },
});

export const { setAutoRenewal, resetLicensing } = slice.actions;
export default slice.reducer;
