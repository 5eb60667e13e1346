import { PackageDownload } from './packaging';

/**
 * Offer a generated payload to the browser as a file download.
 */
export const downloadPayload = (download: PackageDownload): void => {
  const blob = new Blob([download.data], { type: `${download.mimeType};charset=utf-8` });
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement('a');
  anchor.href = url;
  anchor.download = download.fileName;
  document.body.appendChild(anchor);
  anchor.click();
  anchor.remove();
  URL.revokeObjectURL(url);
  console.info('[MigrationSuite][Download] offered', { fileName: download.fileName });
};
