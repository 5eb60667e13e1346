import { DetailPageId } from '../store/Navigation/types';

export interface DetailPageDefinition {
  title: string;
  buttonLabel: string;
  caption: string;
  /** Page cannot render without a working licensing module */
  requiresLicensingModule: boolean;
}

export const DETAIL_PAGES: Record<DetailPageId, DetailPageDefinition> = {
  license_details: {
    title: '📄 License Information',
    buttonLabel: '📋 License Details',
    caption: 'License Type • Expiry • Features',
    requiresLicensingModule: false,
  },
  billing: {
    title: '💰 Billing & Usage Analytics',
    buttonLabel: '💳 Billing & Usage',
    caption: 'Cost Breakdown • Credits • Trends',
    requiresLicensingModule: false,
  },
  packaging: {
    title: '📦 Packaging & Deployment Tools',
    buttonLabel: '📦 Packaging',
    caption: 'Package Builder • Manifest • Validation',
    requiresLicensingModule: true,
  },
  configuration: {
    title: '⚙️ License Configuration',
    buttonLabel: '⚙️ Configuration',
    caption: 'Plans • Auto-Renewal • Account',
    requiresLicensingModule: false,
  },
};
