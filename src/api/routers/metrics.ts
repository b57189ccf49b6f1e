import { z } from 'zod';
import { DIMENSIONS, METRICS } from '@/types/metrics.js';
import { PLATFORMS } from '@/types/sources.js';
import { dateRangeSchema, defaultDateRange } from '@/utils/date.js';
import { publicProcedure, router } from '../trpc.js';

// Omitted range means the last 30 days
const rangeInput = dateRangeSchema.optional();

export const metricsRouter = router({
    unified: publicProcedure.input(z.object({ range: rangeInput }).optional()).query(async ({ ctx, input }) => {
        const range = input?.range ?? defaultDateRange(ctx.pipeline.ctx.now());
        return ctx.pipeline.unifiedMetrics(range.start, range.end);
    }),

    aggregated: publicProcedure
        .input(
            z
                .object({
                    range: rangeInput,
                    platform: z.enum(PLATFORMS).optional(),
                    network: z.string().min(1).optional(),
                    dimensions: z.array(z.enum(DIMENSIONS)).min(1).optional(),
                    sort: z
                        .object({
                            by: z.union([z.enum(DIMENSIONS), z.enum(METRICS)]),
                            direction: z.enum(['asc', 'desc']),
                        })
                        .optional(),
                })
                .optional()
        )
        .query(async ({ ctx, input }) => {
            const range = input?.range ?? defaultDateRange(ctx.pipeline.ctx.now());
            return ctx.pipeline.aggregatedMetrics({
                start: range.start,
                end: range.end,
                platform: input?.platform,
                network: input?.network,
                dimensions: input?.dimensions,
                sort: input?.sort,
            });
        }),
});
