import { initTRPC, TRPCError } from '@trpc/server';
import { ZodError } from 'zod';
import { NotFoundError, ReconciliationError, StoreUnavailableError } from '@/lib/errors.js';
import type { Context } from './context.js';

const t = initTRPC.context<Context>().create({
    errorFormatter({ shape, error }) {
        return {
            ...shape,
            data: {
                ...shape.data,
                domainCode: error.cause instanceof ReconciliationError ? error.cause.code : null,
                zodError: error.cause instanceof ZodError ? error.cause.flatten() : null,
            },
        };
    },
});

/**
 * Turns domain errors thrown by the pipeline into tRPC codes.
 */
const domainErrors = t.middleware(async ({ next }) => {
    const result = await next();
    if (result.ok) {
        return result;
    }

    const cause = result.error.cause;
    if (cause instanceof NotFoundError) {
        throw new TRPCError({ code: 'NOT_FOUND', message: cause.message, cause });
    }
    if (cause instanceof StoreUnavailableError) {
        throw new TRPCError({ code: 'SERVICE_UNAVAILABLE', message: cause.message, cause });
    }
    if (cause instanceof ZodError) {
        throw new TRPCError({ code: 'BAD_REQUEST', message: 'Invalid input', cause });
    }
    return result;
});

/**
 * Base router and procedure helpers
 */
export const router = t.router;
export const publicProcedure = t.procedure.use(domainErrors);
export const createCallerFactory = t.createCallerFactory;
