import type { CreateFastifyContextOptions } from '@trpc/server/adapters/fastify';
import type { FastifyRequest } from 'fastify';
import type { ReconciliationPipeline } from '@/lib/pipeline.js';

export interface Context {
    /** Null when procedures are called in process */
    request: FastifyRequest | null;
    pipeline: ReconciliationPipeline;
}

/**
 * Creates the tRPC context for each request. The pipeline is built once at
 * startup and shared by every request.
 */
export function createContextFactory(pipeline: ReconciliationPipeline) {
    return async function createContext({ req }: CreateFastifyContextOptions): Promise<Context> {
        return {
            request: req,
            pipeline,
        };
    };
}
