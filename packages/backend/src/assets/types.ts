/**
 * @description: Shared types for embedded manifests and resolved static assets.
 * @scope: interface
 * @module: AssetTypes
 * @risk: low - Type changes ripple into every resolver stage.
 */

/**
 * Static file compiled into the process by an external manifest build step.
 */
export type EmbeddedAsset = {
  readonly route: string;
  readonly contentType: string;
  readonly gzipEncoded: boolean;
  readonly data: Uint8Array;
  /** Number of meaningful bytes at the start of `data`. */
  readonly size: number;
};

export type EmbeddedManifest = readonly EmbeddedAsset[];

export type ContentEncoding = 'gzip' | '';

/**
 * Result of a single resolution. The body is a copy owned by the caller.
 */
export type ResolvedAsset = {
  route: string;
  contentType: string;
  encoding: ContentEncoding;
  body: Buffer;
  immutableCache: boolean;
};
