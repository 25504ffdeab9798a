/**
 * @description: Normalizes raw request paths and rejects directory traversal.
 * @scope: backend
 * @module: PathSanitizer
 * @risk: high - A missed traversal token exposes files outside the web root.
 */

// Distinct from every valid path, which always starts with '/'.
const REJECTED_PATH = null;

type SanitizedPath = string | typeof REJECTED_PATH;

const TRAVERSAL_TOKEN = '..';

const isSeparator = (ch: string | undefined): boolean => ch === '/' || ch === '\\';

/**
 * True when the path holds a backslash or a `..` that forms a whole segment.
 * `..` inside a longer segment (`/a..b`, `/...`) is an ordinary name.
 */
const containsTraversal = (path: string): boolean => {
  if (path.includes('\\')) {
    return true;
  }

  let pos = path.indexOf(TRAVERSAL_TOKEN);
  while (pos !== -1) {
    const before = pos === 0 || isSeparator(path[pos - 1]);
    const afterIndex = pos + TRAVERSAL_TOKEN.length;
    const after = afterIndex >= path.length || isSeparator(path[afterIndex]);
    if (before && after) {
      return true;
    }
    pos = path.indexOf(TRAVERSAL_TOKEN, pos + 1);
  }

  return false;
};

const truncateAt = (value: string, marker: string): string => {
  const index = value.indexOf(marker);
  return index === -1 ? value : value.slice(0, index);
};

/**
 * Strip query and fragment, force a leading slash, and reject traversal
 * and NUL bytes.
 * Percent-escapes are left as-is; `%2e%2e` names a file, not a parent.
 */
const sanitizeRequestPath = (rawPath: string): SanitizedPath => {
  if (rawPath.length === 0) {
    return '/';
  }

  // Fragment is cut from what remains after the query cut.
  const trimmed = truncateAt(truncateAt(rawPath, '?'), '#');

  let normalized = trimmed;
  if (normalized.length === 0) {
    normalized = '/';
  } else if (!normalized.startsWith('/')) {
    normalized = `/${normalized}`;
  }

  // The file system refuses NUL in names; such a path can never match.
  if (normalized.includes('\u0000') || containsTraversal(normalized)) {
    return REJECTED_PATH;
  }

  return normalized;
};

export { REJECTED_PATH, containsTraversal, sanitizeRequestPath };
export type { SanitizedPath };
