import { mappingsRouter } from './routers/mappings.js';
import { metricsRouter } from './routers/metrics.js';
import { schemaRouter } from './routers/schema.js';
import { router } from './trpc.js';

export const appRouter = router({
    mappings: mappingsRouter,
    metrics: metricsRouter,
    schema: schemaRouter,
});

export type AppRouter = typeof appRouter;
