import { publicProcedure, router } from '../trpc.js';

export const schemaRouter = router({
    status: publicProcedure.query(async ({ ctx }) => {
        const snapshot = ctx.pipeline.capabilities();
        return {
            version: snapshot.version,
            probedAt: snapshot.probedAt.toISOString(),
            mappingTable: snapshot.mappingTable,
            mappingColumns: [...snapshot.mappingColumns].sort(),
            factTables: [...snapshot.factTables].sort(),
        };
    }),
});
