/**
 * @description: Alias-insensitive index over the embedded asset manifest.
 * @scope: backend
 * @module: ManifestIndex
 * @risk: moderate - Key collisions decide which embedded file is served.
 */
import { logger } from '@asset-resolver/shared';
import { canonicalAlias } from './aliasExpander';
import type { EmbeddedAsset, EmbeddedManifest, ResolvedAsset } from './types';

const manifestLogger = typeof logger.child === 'function' ? logger.child({ module: 'manifestIndex' }) : logger;

type ManifestCollision = {
  key: string;
  replacedRoute: string;
  winningRoute: string;
};

/**
 * Built once from the manifest and never mutated afterwards.
 *
 * Two routes that differ only in `-`/`_` share a key. The later entry in the
 * manifest replaces the earlier one; every such replacement is kept in
 * `collisions` and logged.
 */
class ManifestIndex {
  private readonly entries: ReadonlyMap<string, EmbeddedAsset>;
  readonly collisions: readonly ManifestCollision[];

  constructor(manifest: EmbeddedManifest) {
    const entries = new Map<string, EmbeddedAsset>();
    const collisions: ManifestCollision[] = [];

    for (const asset of manifest) {
      const key = canonicalAlias(asset.route);
      const previous = entries.get(key);
      if (previous) {
        collisions.push({ key, replacedRoute: previous.route, winningRoute: asset.route });
        manifestLogger.warn(
          `Embedded routes ${previous.route} and ${asset.route} share key ${key}; keeping ${asset.route}`
        );
      }
      entries.set(key, asset);
    }

    this.entries = entries;
    this.collisions = collisions;
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(path: string): ResolvedAsset | undefined {
    const asset = this.entries.get(canonicalAlias(path));
    if (!asset) {
      return undefined;
    }

    return {
      route: asset.route,
      contentType: asset.contentType,
      encoding: asset.gzipEncoded ? 'gzip' : '',
      // Buffer.from copies; the manifest bytes stay untouched.
      body: Buffer.from(asset.data.subarray(0, asset.size)),
      immutableCache: true
    };
  }
}

export { ManifestIndex };
export type { ManifestCollision };
