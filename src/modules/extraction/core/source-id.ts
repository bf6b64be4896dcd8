const NUMERIC_SEGMENT_RE = /^\d+$/;

/**
 * Numeric identifier at the end of a filing URL path, e.g. `…/report/1234`.
 */
export const extractIdFromUrl = (url: string): string | null => {
  const path = url.split(/[?#]/)[0] ?? '';
  const segments = path.split('/').filter((segment) => segment !== '');
  const last = segments[segments.length - 1];
  return last !== undefined && NUMERIC_SEGMENT_RE.test(last) ? last : null;
};
