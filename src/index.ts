import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import websocket from '@fastify/websocket';
import { fastifyTRPCPlugin } from '@trpc/server/adapters/fastify';
import Fastify, { type FastifyInstance } from 'fastify';
import { createContextFactory } from '@/api/context.js';
import { registerWebSocketRoute } from '@/api/events/websocket.js';
import { appRouter } from '@/api/router.js';
import { env } from '@/config/env.js';
import { createDatabase, type DatabaseHandle, testConnection } from '@/db/index.js';
import { AppContext } from '@/lib/context.js';
import { ReconciliationPipeline } from '@/lib/pipeline.js';
import { emitEvent } from '@/utils/events.js';
import { logger } from '@/utils/logger.js';

// ============================================================================
// Server Startup
// ============================================================================

async function main() {
    logger.info('Starting campaign reconciler');

    // Database
    const database = createDatabase();
    await testConnection(database.db);

    const context = new AppContext({
        db: database.db,
        logger,
        retry: {
            attempts: env.STORE_RETRY_ATTEMPTS,
            baseDelayMs: env.STORE_RETRY_BASE_DELAY_MS,
            probeTimeoutMs: env.STORE_PROBE_TIMEOUT_MS,
        },
    });
    const pipeline = new ReconciliationPipeline(context);

    // Schema evolution never aborts startup; failed migrations leave features degraded
    const evolution = await pipeline.runSchemaEvolution();
    if (evolution.failed.length > 0) {
        logger.warn({ failed: evolution.failed }, 'Some migrations did not apply');
    }

    const fastify = Fastify({ logger: false });

    // Fastify setup
    await registerPlugins(fastify);
    await registerRoutes(fastify, pipeline);
    registerErrorHandlers(fastify);
    registerShutdownHandlers(fastify, database);

    // Start server
    await fastify.listen({ port: env.PORT, host: '0.0.0.0' });

    emitEvent({
        type: 'schema:evolved',
        applied: evolution.applied,
        failed: evolution.failed,
        capabilitiesVersion: pipeline.capabilities().version,
    });

    logger.info({ port: env.PORT }, 'Campaign reconciler ready');
}

main().catch(err => {
    logger.error({ err }, 'Failed to start server');
    process.exit(1);
});

// ============================================================================
// Helpers
// ============================================================================

async function registerPlugins(fastify: FastifyInstance) {
    await fastify.register(helmet);
    await fastify.register(websocket);
    await fastify.register(cors, {
        origin: (origin, callback) => {
            // Allow requests with no origin (e.g., server-to-server)
            if (!origin) return callback(null, true);

            if (env.CORS_ALLOWED_ORIGINS.includes(origin)) {
                return callback(null, true);
            }

            // Allow any localhost origin for development convenience
            if (URL.canParse(origin)) {
                const { hostname } = new URL(origin);
                if (hostname === 'localhost' || hostname === '127.0.0.1') {
                    return callback(null, true);
                }
            }

            return callback(new Error('Not allowed by CORS'), false);
        },
        credentials: true,
    });
}

async function registerRoutes(fastify: FastifyInstance, pipeline: ReconciliationPipeline) {
    // Health check endpoint
    fastify.get('/api/health', async () => ({
        status: 'ok',
        timestamp: new Date().toISOString(),
        service: 'campaign-reconciler',
        schemaVersion: pipeline.capabilities().version,
    }));

    // WebSocket events endpoint (must be registered BEFORE tRPC to avoid route conflicts)
    registerWebSocketRoute(fastify);

    // tRPC API routes
    await fastify.register(fastifyTRPCPlugin, {
        prefix: '/api',
        trpcOptions: {
            router: appRouter,
            createContext: createContextFactory(pipeline),
        },
    });
}

function registerErrorHandlers(fastify: FastifyInstance) {
    fastify.setNotFoundHandler(async (_request, reply) => {
        reply.status(404);
        return { success: false, error: 'Route not found' };
    });

    fastify.setErrorHandler(async (error: unknown, _request, reply) => {
        const errorMessage = error instanceof Error ? error.message : 'Internal server error';
        const errorStack = error instanceof Error ? error.stack : undefined;

        logger.error({ err: error }, 'Unhandled error');

        emitEvent({
            type: 'error',
            message: errorMessage,
            details: errorStack,
        });

        reply.status(500);
        return { success: false, error: 'Internal server error' };
    });
}

function registerShutdownHandlers(fastify: FastifyInstance, database: DatabaseHandle) {
    const shutdown = async (signal: string) => {
        logger.info({ signal }, 'Received shutdown signal, shutting down gracefully');

        try {
            await fastify.close();
            await database.close();
            logger.info('Shutdown complete');
            process.exit(0);
        } catch (error) {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
}
