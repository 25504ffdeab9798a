/**
 * @description: Canonical alias keys and hyphen/underscore spelling variants of request paths.
 * @scope: backend
 * @module: AliasExpander
 * @risk: moderate - Ordering changes alter which on-disk file wins.
 */
import { AliasLimitExceededError } from './errors';

/**
 * Upper bound on toggle positions. Expansion is 2^k strings and the disk
 * lookup stats up to two files per string, so 12 toggles means 4096
 * candidates and at most 8192 stats per request.
 */
const MAX_TOGGLE_POSITIONS = 12;

const isToggle = (ch: string): boolean => ch === '-' || ch === '_';

/**
 * Manifest lookup key: every `-` becomes `_`.
 */
const canonicalAlias = (path: string): string => path.replace(/-/g, '_');

const togglePositions = (path: string): number[] => {
  const positions: number[] = [];
  for (let i = 0; i < path.length; i += 1) {
    if (isToggle(path[i])) {
      positions.push(i);
    }
  }
  return positions;
};

const countTogglePositions = (path: string): number => togglePositions(path).length;

/**
 * Every spelling of `path` with each `-`/`_` independently set to either
 * character, plus the original. Sorted ascending, duplicate-free.
 *
 * Throws AliasLimitExceededError above MAX_TOGGLE_POSITIONS.
 */
const expandAliases = (path: string): string[] => {
  const toggles = togglePositions(path);
  if (toggles.length === 0) {
    return [path];
  }

  if (toggles.length > MAX_TOGGLE_POSITIONS) {
    throw new AliasLimitExceededError(path, toggles.length, MAX_TOGGLE_POSITIONS);
  }

  // Fixed text around the toggles: segments[b] precedes toggle b.
  const segments: string[] = [];
  let start = 0;
  for (const index of toggles) {
    segments.push(path.slice(start, index));
    start = index + 1;
  }
  const tail = path.slice(start);

  const candidates = new Set<string>();
  const combinations = 2 ** toggles.length;

  // Bit b of the mask drives toggle b: set -> '-', clear -> '_'.
  for (let mask = 0; mask < combinations; mask += 1) {
    let candidate = '';
    for (let bit = 0; bit < segments.length; bit += 1) {
      candidate += segments[bit] + ((mask & (1 << bit)) !== 0 ? '-' : '_');
    }
    candidates.add(candidate + tail);
  }

  candidates.add(path);

  // Default sort compares UTF-16 code units.
  return [...candidates].sort();
};

export { MAX_TOGGLE_POSITIONS, canonicalAlias, countTogglePositions, expandAliases };
