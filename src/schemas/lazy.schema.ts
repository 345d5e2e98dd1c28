import { z } from 'zod';
import { interpolate, literal, state, variable, withDefault, type LazyString } from '../playbook/lazy.js';

export type LazyInput =
  | string
  | { var: string }
  | { state: string; path?: string }
  | { default: [LazyInput, LazyInput] }
  | { format: string; args?: LazyInput[] };

/**
 * JSON form of a lazy expression. A bare string is a literal; objects name
 * the expression by their single key.
 */
export const LazyStringSchema: z.ZodType<LazyString, z.ZodTypeDef, LazyInput> = z.lazy(() =>
  z.union([
    z.string().transform((value): LazyString => literal(value)),
    z
      .object({ var: z.string().min(1) })
      .strict()
      .transform((input): LazyString => variable(input.var)),
    z
      .object({ state: z.string().min(1), path: z.string().default('') })
      .strict()
      .transform((input): LazyString => state(input.state, input.path)),
    z
      .object({ default: z.tuple([LazyStringSchema, LazyStringSchema]) })
      .strict()
      .transform((input): LazyString => withDefault(input.default[0], input.default[1])),
    z
      .object({ format: z.string(), args: z.array(LazyStringSchema).default([]) })
      .strict()
      .transform((input): LazyString => interpolate(input.format, ...input.args)),
  ]),
);
