/**
 * Message for anything caught from an unwrapped thunk or a thrown value.
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'Unknown error occurred';
};
