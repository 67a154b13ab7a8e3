import { z } from 'zod';

import type { JsonValue } from './query';

/** Any JSON value, for validating responses from external services. */
export const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValue),
    z.record(jsonValue),
  ])
);
