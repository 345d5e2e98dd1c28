import { LookupError } from '../exception/errors.js';
import type { Value } from '../types/index.js';
import { isScalar } from './value.js';

export type LookupResult = { ok: true; value: Value } | { ok: false; error: LookupError };

const INDEX_PATTERN = /^\d+$/;

/**
 * Navigate `root` by a dot-separated path.
 *
 * A scalar ends the walk early and is returned even if segments remain.
 * The empty path returns `root` itself.
 */
export function lookup(path: string, root: Value): LookupResult {
  const segments = path === '' ? [] : path.split('.');
  let current: Value = root;

  for (const segment of segments) {
    if (isScalar(current)) {
      return { ok: true, value: current };
    }

    if (Array.isArray(current)) {
      if (!INDEX_PATTERN.test(segment)) {
        return { ok: false, error: new LookupError('non_numeric_index', path) };
      }
      const index = Number(segment);
      if (index >= current.length) {
        return { ok: false, error: new LookupError('not_found', path) };
      }
      current = current[index];
      continue;
    }

    if (!Object.prototype.hasOwnProperty.call(current, segment)) {
      return { ok: false, error: new LookupError('not_found', path) };
    }
    current = current[segment];
  }

  return { ok: true, value: current };
}
