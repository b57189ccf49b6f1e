import { sql } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { env } from '@/config/env.js';
import { logger } from '@/utils/logger.js';
import * as schema from './schema.js';

/**
 * Driver-agnostic handle. Production runs on postgres.js; tests hand in an
 * in-process database with the same schema.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export interface DatabaseHandle {
    db: Database;
    close: () => Promise<void>;
}

const dbLogger = logger.child({ component: 'db' });

export function createDatabase(): DatabaseHandle {
    // Pooled connections, recycled on idle and on age so a proxy that silently
    // drops idle sockets never hands us a dead one for long.
    const queryClient = postgres({
        host: env.DATABASE_HOST,
        port: env.DATABASE_PORT,
        database: env.DATABASE_NAME,
        username: env.DATABASE_USER,
        password: env.DATABASE_PASSWORD,
        max: env.DATABASE_POOL_MAX,
        idle_timeout: env.DATABASE_IDLE_TIMEOUT_SECONDS,
        max_lifetime: env.DATABASE_MAX_LIFETIME_SECONDS,
        connect_timeout: env.DATABASE_CONNECT_TIMEOUT_SECONDS,
        // IF NOT EXISTS DDL raises notices on every boot
        onnotice: notice => dbLogger.debug({ code: notice.code }, notice.message),
    });

    const db = drizzle(queryClient, {
        schema,
        logger: env.NODE_ENV === 'development',
    });

    return {
        db,
        close: () => queryClient.end({ timeout: 5 }),
    };
}

// Test database connection
export const testConnection = async (db: Database) => {
    try {
        await db.execute(sql`select 1`);
        dbLogger.info('Database connection established');
        return true;
    } catch (error) {
        dbLogger.error({ err: error }, 'Unable to connect to database');
        throw error;
    }
};
