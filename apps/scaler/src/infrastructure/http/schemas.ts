import { z } from 'zod';

export const recordBodySchema = z.object({
  duration: z.number().nonnegative(),
});

export const monitorStatsSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('snapshot'),
    count: z.number().int().positive(),
    p50: z.number(),
    p95: z.number(),
    p99: z.number(),
    mean: z.number(),
    windowSpanMs: z.number().nonnegative(),
    windowCapacity: z.number().int().positive(),
  }),
  z.object({
    kind: z.literal('no-data'),
    count: z.literal(0),
    windowCapacity: z.number().int().positive(),
  }),
]);
