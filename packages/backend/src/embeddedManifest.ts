/**
 * Embedded asset manifest, empty in development.
 *
 * A release build replaces this list with the compiled-in frontend files.
 * With it empty, every request falls through to the on-disk web root.
 */
import type { EmbeddedManifest } from './assets/types';

export const embeddedManifest: EmbeddedManifest = Object.freeze([]);
