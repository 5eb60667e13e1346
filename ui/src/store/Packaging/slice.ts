import { createAsyncThunk, createSlice } from '@reduxjs/toolkit';
import { SessionServices } from '../../services/session';
import { PackageDownload, toPackageDownload, ValidationCheckResult } from '../../utils/packaging';
import {
  GenerateManifestArgs,
  GeneratePackageArgs,
  initialPackagingState,
  ValidatePackageArgs,
} from './types';

type ThunkConfig = { extra: SessionServices };

// Simulated processing time; zero resolves on the next microtask
const wait = (ms: number) =>
  ms > 0 ? new Promise<void>(resolve => setTimeout(resolve, ms)) : Promise.resolve();

// Thunks
export const generatePackage = createAsyncThunk<PackageDownload, GeneratePackageArgs, ThunkConfig>(
  'packaging/generatePackage',
  async ({ request, licensing }, { extra }) => {
    await wait(extra.config.generationLatencyMs);
    const contents = extra.licensing.buildPackage(request.packageName, request.modules, licensing, extra.now(), {
      encrypted: request.security.encrypt,
      encryptionLevel: request.security.encryptionLevel,
    });
    console.info('[MigrationSuite][Packaging] package generated', { packageName: request.packageName });
    return toPackageDownload(request.packageName, contents);
  }
);

export const generateManifest = createAsyncThunk<PackageDownload, GenerateManifestArgs, ThunkConfig>(
  'packaging/generateManifest',
  async ({ packageName, licensing }, { extra }) => {
    const manifest = extra.licensing.buildManifest(packageName, licensing, extra.now());
    console.info('[MigrationSuite][Packaging] manifest generated', { packageName });
    return toPackageDownload(packageName, manifest);
  }
);

export const validatePackage = createAsyncThunk<ValidationCheckResult[], ValidatePackageArgs, ThunkConfig>(
  'packaging/validate',
  async ({ licensing, encryptionLevel }, { extra }) => {
    await wait(extra.config.validationLatencyMs);
    return extra.licensing.validatePackage(licensing, encryptionLevel);
  }
);

const slice = createSlice({
  name: 'Packaging',
  initialState: initialPackagingState,
  reducers: {},
  extraReducers: builder => {
    builder
      .addCase(generatePackage.pending, state => {
        state.generating = true; state.lastError = undefined;
      })
      .addCase(generatePackage.fulfilled, (state, action) => {
        state.generating = false; state.lastPackage = action.payload;
      })
      .addCase(generatePackage.rejected, (state, action) => {
        state.generating = false; state.lastError = action.error.message;
      })
      .addCase(generateManifest.pending, state => {
        state.generatingManifest = true; state.lastError = undefined;
      })
      .addCase(generateManifest.fulfilled, (state, action) => {
        state.generatingManifest = false; state.lastManifest = action.payload;
      })
      .addCase(generateManifest.rejected, (state, action) => {
        state.generatingManifest = false; state.lastError = action.error.message;
      })
      .addCase(validatePackage.pending, state => {
        state.validating = true; state.validationResults = undefined; state.lastError = undefined;
      })
      .addCase(validatePackage.fulfilled, (state, action) => {
        state.validating = false; state.validationResults = action.payload;
      })
      .addCase(validatePackage.rejected, (state, action) => {
        state.validating = false; state.lastError = action.error.message;
      });
  }
});

export default slice.reducer;
