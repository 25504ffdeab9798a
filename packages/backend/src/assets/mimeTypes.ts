/**
 * @description: Extension to content-type lookup for on-disk assets.
 * @scope: backend
 * @module: MimeTypes
 * @risk: low - Wrong types break rendering, not delivery.
 */
import path from 'node:path';

// --- MIME lookup table ---
const MIME_MAP = new Map<string, string>([
  ['.js', 'application/javascript'],
  ['.mjs', 'application/javascript'],
  ['.css', 'text/css'],
  ['.html', 'text/html'],
  ['.json', 'application/json'],
  ['.svg', 'image/svg+xml'],
  ['.png', 'image/png'],
  ['.jpg', 'image/jpeg'],
  ['.jpeg', 'image/jpeg'],
  ['.ico', 'image/x-icon'],
]);

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';
const GZIP_EXTENSION = '.gz';

const extensionOf = (filePath: string): string => path.extname(filePath).toLowerCase();

const isGzipPath = (filePath: string): boolean => extensionOf(filePath) === GZIP_EXTENSION;

/**
 * Content type for a file name. `.gz` files report the type of the inner
 * extension (`app.js.gz` -> application/javascript).
 */
const contentTypeFor = (filePath: string): string => {
  let extension = extensionOf(filePath);
  if (extension === GZIP_EXTENSION) {
    extension = extensionOf(filePath.slice(0, -GZIP_EXTENSION.length));
  }
  return MIME_MAP.get(extension) ?? DEFAULT_CONTENT_TYPE;
};

export { DEFAULT_CONTENT_TYPE, GZIP_EXTENSION, contentTypeFor, isGzipPath };
