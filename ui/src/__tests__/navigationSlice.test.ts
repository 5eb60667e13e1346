import reducer, { back, navigate } from '../store/Navigation/slice';
import { DETAIL_PAGE_IDS, initialNavigationState } from '../store/Navigation/types';

describe('navigation slice reducer', () => {
  beforeEach(() => {
    jest.spyOn(console, 'info').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('starts on main', () => {
    expect(reducer(undefined, { type: 'unknown' })).toEqual(initialNavigationState);
    expect(initialNavigationState.location).toEqual({ kind: 'page', page: 'main' });
  });

  it.each(DETAIL_PAGE_IDS)('returns to main after visiting %s', page => {
    const detail = reducer(initialNavigationState, navigate(page));
    expect(detail.location).toEqual({ kind: 'page', page });
    const returned = reducer(detail, back());
    expect(returned.location).toEqual({ kind: 'page', page: 'main' });
  });

  it('treats back on main as a no-op', () => {
    expect(reducer(initialNavigationState, back())).toBe(initialNavigationState);
  });

  it('ignores navigation to main from main', () => {
    expect(reducer(initialNavigationState, navigate('main'))).toBe(initialNavigationState);
  });

  it('does not move between detail pages', () => {
    const billing = reducer(initialNavigationState, navigate('billing'));
    const attempted = reducer(billing, navigate('packaging'));
    expect(attempted).toBe(billing);
    expect(console.warn).toHaveBeenCalledWith(
      '[MigrationSuite][Navigation] navigate ignored outside main',
      { target: 'packaging' }
    );
  });

  it('records an undeclared page as an unknown location that back leaves', () => {
    const unknown = reducer(initialNavigationState, navigate('reports'));
    expect(unknown.location).toEqual({ kind: 'unknown', requested: 'reports' });
    expect(reducer(unknown, back()).location).toEqual({ kind: 'page', page: 'main' });
  });
});
