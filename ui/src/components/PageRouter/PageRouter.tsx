import React from 'react';
import { useAppSelector } from '../../store/configureStore';
import { DetailPageId } from '../../store/Navigation/types';
import { useSessionServices } from '../../contexts/SessionServicesContext';
import { DETAIL_PAGES } from '../../constants/pages';
import DetailPageLayout from '../Layout/DetailPageLayout';
import UnavailableNotice from '../Licensing/UnavailableNotice';
import UnknownPage from './UnknownPage';
import MainPage from '../../pages/Main/MainPage';
import LicenseDetailsPage from '../../pages/LicenseDetails/LicenseDetailsPage';
import BillingPage from '../../pages/Billing/BillingPage';
import PackagingPage from '../../pages/Packaging/PackagingPage';
import ConfigurationPage from '../../pages/Configuration/ConfigurationPage';

// Exhaustive over DetailPageId: adding a page without a view fails to compile
const DETAIL_VIEWS: Record<DetailPageId, React.FC> = {
  license_details: LicenseDetailsPage,
  billing: BillingPage,
  packaging: PackagingPage,
  configuration: ConfigurationPage,
};

const PageRouter: React.FC = () => {
  const location = useAppSelector(s => s.Navigation.location);
  const { licensing } = useSessionServices();

  if (location.kind === 'unknown') {
    return <UnknownPage requested={location.requested} />;
  }
  if (location.page === 'main') {
    return <MainPage />;
  }

  const definition = DETAIL_PAGES[location.page];
  const View = DETAIL_VIEWS[location.page];
  return (
    <DetailPageLayout title={definition.title}>
      {definition.requiresLicensingModule && !licensing.available ? <UnavailableNotice /> : <View />}
    </DetailPageLayout>
  );
};

export default PageRouter;
