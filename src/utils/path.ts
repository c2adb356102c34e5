import path from 'node:path';

export const normalizePath = (value: string): string => {
  if (!value) return '/';
  return value.startsWith('/') ? value : `/${value}`;
};

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Reduces a request URL to its path: query string and fragment are dropped, and
 * `scheme://host[:port]` is stripped when present.
 */
export const extractPath = (url: string): string => {
  const withoutQuery = url.split(/[?#]/, 1)[0];
  const schemeMatch = SCHEME_PATTERN.exec(withoutQuery);
  if (!schemeMatch) {
    return normalizePath(withoutQuery);
  }

  const rest = withoutQuery.slice(schemeMatch[0].length);
  const slash = rest.indexOf('/');
  return slash === -1 ? '/' : rest.slice(slash);
};

export const resolveFrom = (baseDir: string, target: string): string => {
  if (path.isAbsolute(target)) {
    return target;
  }
  return path.resolve(baseDir, target);
};
