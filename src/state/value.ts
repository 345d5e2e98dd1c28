import { ValueSchema } from '../schemas/value.schema.js';
import { errorMessage } from '../exception/errors.js';
import type { Output, Scalar, Value } from '../types/index.js';

export type ValueConversion = { ok: true; value: Value } | { ok: false; error: string };

export function isScalar(value: Value): value is Scalar {
  return value === null || typeof value !== 'object';
}

/**
 * Convert module output into a detached Value through a JSON round trip.
 * Never throws: circular structures, bigints, outputs nested too deeply to
 * validate and outputs with no JSON form come back as a failed conversion.
 * So does output that validation would alter, such as an own `__proto__` key.
 */
export function toValue(output: Output): ValueConversion {
  try {
    const json = JSON.stringify(output);
    if (json === undefined) {
      return { ok: false, error: 'output has no JSON representation' };
    }

    const parsed = ValueSchema.safeParse(JSON.parse(json));
    if (!parsed.success) {
      return { ok: false, error: parsed.error.message };
    }
    if (JSON.stringify(parsed.data) !== json) {
      return { ok: false, error: 'output does not survive a JSON round trip' };
    }
    return { ok: true, value: parsed.data };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}
