import { eq, getTableName, sql } from 'drizzle-orm';
import type { Database } from '@/db/index.js';
import { describeError, isConflictRaceError } from '@/db/errors.js';
import { schemaMigrations } from '@/db/schema.js';
import type { AppContext } from '@/lib/context.js';
import { ConflictRaceError, MigrationFailure } from '@/lib/errors.js';
import type { Logger } from '@/utils/logger.js';
import { addColumnIfMissing } from './columns.js';
import { MIGRATIONS } from './migrations.js';
import { blocksDependents, transition } from './state-machine.js';
import type { Migration, MigrationState, MigrationStep, SchemaEvolutionResult } from './types.js';

export { MIGRATIONS } from './migrations.js';
export type { Migration, MigrationState, MigrationStep, SchemaEvolutionResult } from './types.js';

// Serializes migration transactions across every instance sharing the database.
const SCHEMA_EVOLUTION_LOCK_KEY = 7_150_329;

const LEDGER_TABLE = getTableName(schemaMigrations);

const createLedger = `
CREATE TABLE IF NOT EXISTS ${LEDGER_TABLE} (
    id serial PRIMARY KEY,
    name text NOT NULL,
    applied_at timestamptz NOT NULL DEFAULT now(),
    CONSTRAINT ${LEDGER_TABLE}_name_unique UNIQUE (name)
)`;

const byName = (a: Migration, b: Migration) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

async function ensureLedger(ctx: AppContext, log: Logger): Promise<void> {
    await ctx.probe('migration ledger bootstrap', async () => {
        try {
            await ctx.db.execute(sql.raw(createLedger));
        } catch (error) {
            if (!isConflictRaceError(error)) {
                throw error;
            }
            const race = new ConflictRaceError('migration ledger bootstrap', { cause: error });
            log.info({ code: race.code }, race.message);
        }
    });
}

async function readLedger(ctx: AppContext): Promise<Set<string>> {
    const rows = await ctx.probe('migration ledger read', () => ctx.db.select({ name: schemaMigrations.name }).from(schemaMigrations));
    return new Set(rows.map(row => row.name));
}

async function runStep(tx: Database, step: MigrationStep, log: Logger): Promise<void> {
    try {
        // Nested transaction = savepoint, so a lost race does not abort the migration
        await tx.transaction(async savepoint => {
            if (step.kind === 'sql') {
                await savepoint.execute(sql.raw(step.statement));
                return;
            }
            await addColumnIfMissing(savepoint, step.table, step.column, step.definition);
        });
    } catch (error) {
        if (!isConflictRaceError(error)) {
            throw error;
        }
        const race = new ConflictRaceError(step.kind === 'sql' ? step.description : `add column ${step.table}.${step.column}`, { cause: error });
        log.info({ code: race.code }, race.message);
    }
}

/**
 * Apply one migration under the cross-instance lock. Returns false when another
 * instance recorded it between our ledger read and taking the lock.
 */
async function applyMigration(ctx: AppContext, migration: Migration, log: Logger): Promise<boolean> {
    return ctx.run(`migration ${migration.name}`, db =>
        db.transaction(async tx => {
            await tx.execute(sql.raw(`SELECT pg_advisory_xact_lock(${SCHEMA_EVOLUTION_LOCK_KEY})`));

            const recorded = await tx.select({ id: schemaMigrations.id }).from(schemaMigrations).where(eq(schemaMigrations.name, migration.name)).limit(1);
            if (recorded.length > 0) {
                return false;
            }

            for (const step of migration.steps) {
                await runStep(tx, step, log);
            }

            await tx.insert(schemaMigrations).values({ name: migration.name, appliedAt: ctx.now() }).onConflictDoNothing({ target: schemaMigrations.name });
            return true;
        })
    );
}

/**
 * Bring the schema up to date. A failing migration is logged and skipped; the
 * ones after it still run unless they depend on it. Refreshes the capability
 * snapshot before returning.
 */
export async function runSchemaEvolution(ctx: AppContext, migrations: Migration[] = MIGRATIONS): Promise<SchemaEvolutionResult> {
    const log = ctx.logger.child({ component: 'schema-evolution' });

    await ensureLedger(ctx, log);
    const alreadyApplied = await readLedger(ctx);

    const states = new Map<string, MigrationState>();
    const result: SchemaEvolutionResult = { applied: [], failed: [] };

    for (const migration of [...migrations].sort(byName)) {
        if (alreadyApplied.has(migration.name)) {
            states.set(migration.name, 'applied');
            continue;
        }

        let state: MigrationState = 'pending';

        const blockedBy = (migration.dependsOn ?? []).filter(dependency => !alreadyApplied.has(dependency) && blocksDependents(states.get(dependency)));
        if (blockedBy.length > 0) {
            state = transition(state, 'block');
            states.set(migration.name, state);
            result.failed.push(migration.name);
            log.warn({ migration: migration.name, blockedBy }, 'Migration blocked by unapplied dependencies');
            continue;
        }

        state = transition(state, 'start');
        log.info({ migration: migration.name }, migration.description);

        try {
            const appliedHere = await applyMigration(ctx, migration, log);
            state = transition(state, 'succeed');
            if (appliedHere) {
                result.applied.push(migration.name);
            } else {
                log.info({ migration: migration.name }, 'Already applied by another instance');
            }
        } catch (error) {
            state = transition(state, 'fail');
            const failure = new MigrationFailure(migration.name, describeError(error), { cause: error });
            log.error({ migration: migration.name }, failure.message);
            result.failed.push(migration.name);
        }

        states.set(migration.name, state);
    }

    await ctx.capabilities.refresh();

    log.info({ applied: result.applied.length, failed: result.failed.length }, 'Schema evolution finished');
    return result;
}
