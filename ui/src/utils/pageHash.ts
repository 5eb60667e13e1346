import { isAtMain, MAIN_LOCATION, PageLocation, resolveLocation } from '../store/Navigation/types';

/**
 * Read the page location from a hash such as `#/billing`. An empty hash means main.
 */
export const locationFromHash = (hash: string): PageLocation => {
  const target = hash.replace(/^#\/?/, '').trim();
  return target === '' ? MAIN_LOCATION : resolveLocation(target);
};

export const hashForLocation = (location: PageLocation): string => {
  if (isAtMain(location)) return '#/';
  return location.kind === 'page' ? `#/${location.page}` : `#/${location.requested}`;
};
