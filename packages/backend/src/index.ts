/**
 * @description: Public exports for the static asset resolver and its HTTP mapping.
 * @scope: interface
 * @module: BackendExports
 * @risk: medium - Export changes can break downstream hosts.
 */

export { StaticAssetResolver } from './assets/staticAssetResolver';
export type { ResolveResult, StaticAssetResolverOptions } from './assets/staticAssetResolver';
export { ManifestIndex } from './assets/manifestIndex';
export type { ManifestCollision } from './assets/manifestIndex';
export { REJECTED_PATH, containsTraversal, sanitizeRequestPath } from './assets/pathSanitizer';
export type { SanitizedPath } from './assets/pathSanitizer';
export { MAX_TOGGLE_POSITIONS, canonicalAlias, countTogglePositions, expandAliases } from './assets/aliasExpander';
export { DEFAULT_CONTENT_TYPE, contentTypeFor, isGzipPath } from './assets/mimeTypes';
export { isMissingFileError, nodeFileAccess } from './assets/fileAccess';
export type { FileAccess, FileKind } from './assets/fileAccess';
export * from './assets/errors';
export type { ContentEncoding, EmbeddedAsset, EmbeddedManifest, ResolvedAsset } from './assets/types';

export { buildStaticResponse, createStaticRequestHandler } from './http/assets';
export type { StaticResponse } from './http/assets';
