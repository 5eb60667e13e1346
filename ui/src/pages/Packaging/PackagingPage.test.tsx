import React from 'react';
import { fireEvent, screen, within } from '@testing-library/react';
import '@testing-library/jest-dom';
import toast from 'react-hot-toast';
import PackagingPage from './PackagingPage';
import { downloadPayload } from '../../utils/download';
import { renderWithSession } from '../../testUtils/renderWithSession';

jest.mock('react-hot-toast', () => {
  const toast = Object.assign(jest.fn(), { success: jest.fn(), error: jest.fn() });
  return { __esModule: true, default: toast, Toaster: () => null };
});

jest.mock('../../utils/download', () => ({ downloadPayload: jest.fn() }));

describe('PackagingPage', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('estimates the package from the selected modules', () => {
    renderWithSession(<PackagingPage />);
    expect(screen.getByTestId('package-size')).toHaveTextContent('Estimated Package Size: 125 MB');
    expect(screen.getByTestId('package-components')).toHaveTextContent('Components: 3 modules');

    fireEvent.click(screen.getByLabelText('Include Payroll Module'));
    expect(screen.getByTestId('package-size')).toHaveTextContent('Estimated Package Size: 105 MB');
    expect(screen.getByTestId('package-components')).toHaveTextContent('Components: 2 modules');
  });

  it('generates a package and offers it for download', async () => {
    const { store } = renderWithSession(<PackagingPage />);
    fireEvent.click(screen.getByText('🎁 Generate Package'));

    const download = await screen.findByText('📥 Download Package Manifest');
    expect(toast.success).toHaveBeenCalledWith('✅ Package generated successfully!');
    expect(store.getState().Packaging.lastPackage?.fileName).toBe('Migration_Suite_v2.1_manifest.json');

    fireEvent.click(download);
    expect(downloadPayload).toHaveBeenCalledWith(store.getState().Packaging.lastPackage);
  });

  it('rejects an empty package name', async () => {
    const { store } = renderWithSession(<PackagingPage />);
    fireEvent.change(screen.getByLabelText('Package Name'), { target: { value: '   ' } });
    fireEvent.click(screen.getByText('🎁 Generate Package'));

    expect(await screen.findByText('Package name is required')).toBeInTheDocument();
    expect(store.getState().Packaging.lastPackage).toBeUndefined();
    expect(toast.success).not.toHaveBeenCalled();
  });

  it('generates a manifest under the entered name', async () => {
    const { store } = renderWithSession(<PackagingPage />);
    fireEvent.change(screen.getByLabelText('Package Name'), { target: { value: 'Custom_Build' } });
    fireEvent.click(screen.getByText('📋 Generate Manifest'));

    expect(await screen.findByText('📥 Download Manifest')).toBeInTheDocument();
    expect(toast.success).toHaveBeenCalledWith('✅ Manifest generated!');
    expect(store.getState().Packaging.lastManifest?.fileName).toBe('Custom_Build_manifest.json');
  });

  it('accepts a free-text package name', async () => {
    const { store } = renderWithSession(<PackagingPage />);
    fireEvent.change(screen.getByLabelText('Package Name'), { target: { value: 'Suite Release v2.1' } });
    fireEvent.click(screen.getByText('📋 Generate Manifest'));

    expect(await screen.findByText('📥 Download Manifest')).toBeInTheDocument();
    expect(screen.queryByRole('alert')).not.toBeInTheDocument();
    const manifest = store.getState().Packaging.lastManifest;
    expect(manifest?.fileName).toBe('Suite Release v2.1_manifest.json');
    expect(JSON.parse(manifest?.data ?? '{}').package_info.name).toBe('Suite Release v2.1');
  });

  it('lists validation results for the chosen encryption level', async () => {
    renderWithSession(<PackagingPage />);
    fireEvent.change(screen.getByLabelText('Encryption Level'), { target: { value: 'AES-128' } });
    fireEvent.click(screen.getByText('🔍 Validate Package'));

    const results = await screen.findByTestId('validation-results');
    const items = within(results).getAllByRole('listitem');
    expect(items).toHaveLength(6);
    expect(items[1]).toHaveTextContent('Encryption: ✅ AES-128 confirmed');
    expect(items[3]).toHaveTextContent('License: ✅ Valid until 2025-12-31');
    expect(toast.success).toHaveBeenCalledWith('✅ Package validation completed!');
  });
});
