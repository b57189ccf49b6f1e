import { z } from 'zod';
import { mappingInputSchema, reorderItemsSchema } from '@/types/mapping.js';
import { SOURCE_SYSTEMS } from '@/types/sources.js';
import { emitEvent } from '@/utils/events.js';
import { publicProcedure, router } from '../trpc.js';

const sourceFilter = z.object({ sourceSystem: z.enum(SOURCE_SYSTEMS).optional() }).optional();
const mappingId = z.object({ id: z.number().int().positive() });

export const mappingsRouter = router({
    list: publicProcedure.input(sourceFilter).query(async ({ ctx, input }) => {
        return ctx.pipeline.listMappings(input?.sourceSystem);
    }),

    get: publicProcedure.input(mappingId).query(async ({ ctx, input }) => {
        return ctx.pipeline.getMapping(input.id);
    }),

    unmapped: publicProcedure.input(sourceFilter).query(async ({ ctx, input }) => {
        return ctx.pipeline.listUnmapped(input?.sourceSystem);
    }),

    upsert: publicProcedure.input(mappingInputSchema).mutation(async ({ ctx, input }) => {
        const mapping = await ctx.pipeline.upsertMapping(input);

        emitEvent({
            type: 'mapping:updated',
            mappingId: mapping.id,
            sourceSystem: mapping.sourceSystem,
            externalCampaignId: mapping.externalCampaignId,
            isActive: mapping.isActive,
        });

        return mapping;
    }),

    softDelete: publicProcedure.input(mappingId).mutation(async ({ ctx, input }) => {
        await ctx.pipeline.softDeleteMapping(input.id);
        const mapping = await ctx.pipeline.getMapping(input.id);

        emitEvent({
            type: 'mapping:updated',
            mappingId: mapping.id,
            sourceSystem: mapping.sourceSystem,
            externalCampaignId: mapping.externalCampaignId,
            isActive: mapping.isActive,
        });

        return { success: true };
    }),

    reorder: publicProcedure.input(z.object({ items: reorderItemsSchema })).mutation(async ({ ctx, input }) => {
        await ctx.pipeline.reorderMappings(input.items);

        emitEvent({
            type: 'mappings:reordered',
            mappingIds: input.items.map(item => item.id),
        });

        return { success: true };
    }),
});
