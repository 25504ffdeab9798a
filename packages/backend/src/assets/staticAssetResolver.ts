/**
 * @description: Resolves request paths to embedded or on-disk static assets.
 * @scope: core
 * @module: StaticAssetResolver
 * @risk: high - Resolution bugs can serve the wrong file or leak files outside the web root.
 *
 * @impact
 * Embedded assets always win over disk. Disk lookups try every hyphen/underscore
 * spelling of the path in sorted order and stop at the first regular file.
 */
import path from 'node:path';
import { logger } from '@asset-resolver/shared';

import { MAX_TOGGLE_POSITIONS, countTogglePositions, expandAliases } from './aliasExpander';
import { AssetNotFoundError, AssetReadError } from './errors';
import { isMissingFileError, nodeFileAccess } from './fileAccess';
import type { FileAccess, FileKind } from './fileAccess';
import { ManifestIndex } from './manifestIndex';
import { GZIP_EXTENSION, contentTypeFor, isGzipPath } from './mimeTypes';
import { REJECTED_PATH, sanitizeRequestPath } from './pathSanitizer';
import type { EmbeddedManifest, ResolvedAsset } from './types';

const resolverLogger = typeof logger.child === 'function' ? logger.child({ module: 'staticAssetResolver' }) : logger;

// --- Types ---
type StaticAssetResolverOptions = {
  /** Directory searched after the manifest. Empty disables disk lookups. */
  webRoot?: string;
  manifest?: EmbeddedManifest;
  fileAccess?: FileAccess;
};

type ResolveResult =
  | { ok: true; asset: ResolvedAsset }
  | { ok: false; error: AssetNotFoundError };

// --- Resolver ---
class StaticAssetResolver {
  private readonly webRoot: string;
  private readonly manifestIndex: ManifestIndex;
  private readonly fileAccess: FileAccess;

  constructor(options: StaticAssetResolverOptions = {}) {
    this.webRoot = options.webRoot ?? '';
    this.manifestIndex = new ManifestIndex(options.manifest ?? []);
    this.fileAccess = options.fileAccess ?? nodeFileAccess;
  }

  get embeddedOnly(): boolean {
    return this.webRoot.length === 0;
  }

  get manifest(): ManifestIndex {
    return this.manifestIndex;
  }

  /**
   * Undefined when nothing matches or the path was rejected; callers cannot
   * tell the two apart. Rejects with AssetReadError when a
   * matching file cannot be read.
   */
  async resolve(requestPath: string): Promise<ResolvedAsset | undefined> {
    const sanitized = sanitizeRequestPath(requestPath);
    if (sanitized === REJECTED_PATH) {
      resolverLogger.debug(`Rejected request path ${requestPath}`);
      return undefined;
    }

    const embedded = this.manifestIndex.lookup(sanitized);
    if (embedded) {
      return embedded;
    }

    return this.resolveFromDisk(sanitized);
  }

  async resolveOrError(requestPath: string): Promise<ResolveResult> {
    const asset = await this.resolve(requestPath);
    if (!asset) {
      return { ok: false, error: new AssetNotFoundError(requestPath) };
    }
    return { ok: true, asset };
  }

  private async resolveFromDisk(sanitized: string): Promise<ResolvedAsset | undefined> {
    if (this.embeddedOnly) {
      return undefined;
    }

    const toggleCount = countTogglePositions(sanitized);
    if (toggleCount > MAX_TOGGLE_POSITIONS) {
      resolverLogger.debug(`Skipping disk lookup for ${sanitized}: ${toggleCount} alias positions`);
      return undefined;
    }

    for (const alias of expandAliases(sanitized)) {
      if (!alias.startsWith('/')) {
        continue;
      }

      for (const route of this.candidateRoutes(alias)) {
        const asset = await this.readCandidate(route);
        if (asset) {
          return asset;
        }
      }
    }

    return undefined;
  }

  // The request itself first, then a pre-compressed sibling.
  private candidateRoutes(alias: string): string[] {
    if (alias.endsWith('/') || isGzipPath(alias)) {
      return [alias];
    }
    return [alias, `${alias}${GZIP_EXTENSION}`];
  }

  private async readCandidate(route: string): Promise<ResolvedAsset | undefined> {
    const filePath = path.join(this.webRoot, route.slice(1));

    let kind: FileKind;
    try {
      kind = await this.fileAccess.stat(filePath);
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      throw new AssetReadError(filePath, error);
    }

    if (kind !== 'file') {
      return undefined;
    }

    let body: Buffer;
    try {
      body = await this.fileAccess.readFile(filePath);
    } catch (error) {
      throw new AssetReadError(filePath, error);
    }

    return {
      route,
      contentType: contentTypeFor(filePath),
      encoding: isGzipPath(filePath) ? 'gzip' : '',
      body,
      immutableCache: false
    };
  }
}

export { StaticAssetResolver };
export type { ResolveResult, StaticAssetResolverOptions };
