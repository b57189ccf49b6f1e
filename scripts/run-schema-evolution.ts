#!/usr/bin/env node
/**
 * Apply pending schema migrations and print the resulting capability snapshot.
 *
 * Usage:
 *   tsx scripts/run-schema-evolution.ts [--status]
 *
 * Options:
 *   --status   Only print the capability snapshot; apply nothing
 *
 * Environment variables:
 *   DATABASE_HOST, DATABASE_PORT, DATABASE_NAME, DATABASE_USER, DATABASE_PASSWORD
 */

import { env } from '@/config/env.js';
import { createDatabase } from '@/db/index.js';
import { AppContext } from '@/lib/context.js';
import { ReconciliationPipeline } from '@/lib/pipeline.js';
import type { SchemaCapabilities } from '@/lib/schema-capabilities/index.js';
import { logger } from '@/utils/logger.js';

const statusOnly = process.argv.includes('--status');

const printSnapshot = (snapshot: SchemaCapabilities) => {
    console.log(`Capability snapshot v${snapshot.version}`);
    console.log(`  mapping table:   ${snapshot.mappingTable ? 'present' : 'missing'}`);
    console.log(`  mapping columns: ${[...snapshot.mappingColumns].sort().join(', ') || '(none)'}`);
    console.log(`  fact tables:     ${[...snapshot.factTables].sort().join(', ') || '(none)'}`);
};

async function main(): Promise<number> {
    const database = createDatabase();
    try {
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

        if (statusOnly) {
            printSnapshot(await context.capabilities.refresh());
            return 0;
        }

        const result = await pipeline.runSchemaEvolution();
        console.log(`Applied: ${result.applied.join(', ') || '(none)'}`);
        console.log(`Failed:  ${result.failed.join(', ') || '(none)'}`);
        printSnapshot(pipeline.capabilities());

        return result.failed.length > 0 ? 1 : 0;
    } finally {
        await database.close();
    }
}

main()
    .then(code => process.exit(code))
    .catch(error => {
        logger.error({ err: error }, 'Schema evolution failed');
        process.exit(1);
    });
