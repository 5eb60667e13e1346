export const PAGE_IDS = ['main', 'license_details', 'billing', 'packaging', 'configuration'] as const;

export type PageId = typeof PAGE_IDS[number];

export type DetailPageId = Exclude<PageId, 'main'>;

export const DETAIL_PAGE_IDS: DetailPageId[] = ['license_details', 'billing', 'packaging', 'configuration'];

export type PageLocation =
  | { kind: 'page'; page: PageId }
  | { kind: 'unknown'; requested: string };

export interface NavigationState {
  location: PageLocation;
}

export const MAIN_LOCATION: PageLocation = { kind: 'page', page: 'main' };

export const initialNavigationState: NavigationState = {
  location: MAIN_LOCATION,
};

export function isPageId(value: string): value is PageId {
  return PAGE_IDS.some(page => page === value);
}

export function resolveLocation(target: string): PageLocation {
  return isPageId(target) ? { kind: 'page', page: target } : { kind: 'unknown', requested: target };
}

export function isAtMain(location: PageLocation): boolean {
  return location.kind === 'page' && location.page === 'main';
}
