import { z } from 'zod';
import type { Value } from '../types/value.js';

export const ValueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(ValueSchema),
    z.record(ValueSchema),
  ]),
);
