import { AmbiguousIndexError, NotFoundError } from './errors.js';
import { incCounter } from './metrics.js';

export interface LookupOptions<T> {
  identify: (entity: T) => string;
  /** Derives the positional index from an identifier; `undefined` skips the entity. */
  indexOf: (identifier: string) => number | undefined;
  /** Finish the scan and name every duplicate instead of failing on the second match. */
  reportAllDuplicates?: boolean;
  /**
   * Snapshot of the found entity; defaults to `structuredClone`.
   * Entities carrying functions or a class prototype need their own copy (or identity, when the accessor already copied).
   */
  copy?: (entity: T) => T;
}

export type LookupResult<T> =
  | { status: 'found'; entity: T }
  | { status: 'not_found'; error: NotFoundError }
  | { status: 'ambiguous'; error: AmbiguousIndexError };

/**
 * Resolve the single entity whose identifier derives `targetIndex`.
 * Duplicates are an error, never a first-match pick. The returned entity is a copy.
 */
export function findUniqueByIndex<T>(collection: readonly T[], targetIndex: number, opts: LookupOptions<T>): LookupResult<T> {
  if (!Number.isInteger(targetIndex) || targetIndex < 0) {
    throw new RangeError(`targetIndex must be a non-negative integer (got ${targetIndex})`);
  }
  let match: T | undefined;
  const matched: string[] = [];

  for (const entity of collection) {
    const id = opts.identify(entity);
    if (opts.indexOf(id) !== targetIndex) continue;
    matched.push(id);
    if (matched.length === 1) { match = entity; continue; }
    if (!opts.reportAllDuplicates) break;
  }

  if (matched.length > 1) {
    incCounter('lookups_total', { outcome: 'ambiguous' });
    return { status: 'ambiguous', error: new AmbiguousIndexError(targetIndex, matched) };
  }
  if (match === undefined) {
    incCounter('lookups_total', { outcome: 'not_found' });
    return { status: 'not_found', error: new NotFoundError(targetIndex) };
  }
  incCounter('lookups_total', { outcome: 'found' });
  const copy: (entity: T) => T = opts.copy ?? structuredClone;
  return { status: 'found', entity: copy(match) };
}

/**
 * Index rule for identifiers ending in `<separator><index>`, e.g. `node-2` → 2.
 * The suffix must be the canonical decimal form: `node-01` and `node-1x` have no index,
 * nor does anything past the safe integer range.
 */
export function trailingIndex(separator = '-'): (identifier: string) => number | undefined {
  return identifier => {
    const at = identifier.lastIndexOf(separator);
    if (at < 0) return undefined;
    const digits = identifier.slice(at + separator.length);
    if (!/^(0|[1-9]\d*)$/.test(digits)) return undefined;
    const index = Number(digits);
    return Number.isSafeInteger(index) ? index : undefined;
  };
}
