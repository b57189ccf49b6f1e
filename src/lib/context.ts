import { sql } from 'drizzle-orm';
import type { Database } from '@/db/index.js';
import { withBoundedRetry, withConnectionRetry } from '@/db/retry.js';
import { SchemaCapabilityStore } from '@/lib/schema-capabilities/index.js';
import { type Logger, logger as rootLogger } from '@/utils/logger.js';

export interface StoreRetrySettings {
    attempts: number;
    baseDelayMs: number;
    probeTimeoutMs: number;
}

export interface AppContextOptions {
    db: Database;
    logger?: Logger;
    now?: () => Date;
    retry?: Partial<StoreRetrySettings>;
}

const DEFAULT_RETRY: StoreRetrySettings = {
    attempts: 3,
    baseDelayMs: 500,
    probeTimeoutMs: 5000,
};

/**
 * Everything a pipeline component needs for the lifetime of the process: the
 * pooled database, the schema capability snapshot, the clock and the logger.
 * Built once at startup and handed to each component.
 */
export class AppContext {
    readonly db: Database;
    readonly logger: Logger;
    readonly now: () => Date;
    readonly retry: StoreRetrySettings;
    readonly capabilities: SchemaCapabilityStore;

    constructor(options: AppContextOptions) {
        this.db = options.db;
        this.logger = options.logger ?? rootLogger;
        this.now = options.now ?? (() => new Date());
        this.retry = { ...DEFAULT_RETRY, ...options.retry };
        this.capabilities = new SchemaCapabilityStore(this.db, (label, operation) => this.probe(label, operation), this.now);
    }

    /**
     * Run a unit of work, retrying once on a stale connection.
     */
    run<T>(label: string, operation: (db: Database) => Promise<T>): Promise<T> {
        return withConnectionRetry(() => operation(this.db), {
            label,
            logger: this.logger,
            validate: async () => {
                await this.db.execute(sql`select 1`);
            },
        });
    }

    /**
     * Bounded timeout, a few attempts, linear backoff. For bootstrap and
     * metadata calls that must not hang startup.
     */
    probe<T>(label: string, operation: () => Promise<T>): Promise<T> {
        return withBoundedRetry(operation, {
            label,
            attempts: this.retry.attempts,
            baseDelayMs: this.retry.baseDelayMs,
            timeoutMs: this.retry.probeTimeoutMs,
            logger: this.logger,
        });
    }
}
