/**
 * One idempotent schema change. Steps run in order inside the migration's
 * transaction, each under its own savepoint.
 */
export type MigrationStep =
    | { kind: 'sql'; description: string; statement: string }
    | { kind: 'addColumn'; table: string; column: string; definition: string };

export interface Migration {
    /** Sort key and ledger id, e.g. 0002_add_mapping_network */
    name: string;
    description: string;

    /** Migrations that must have applied before this one may run */
    dependsOn?: string[];

    steps: MigrationStep[];
}

export type MigrationState = 'pending' | 'applying' | 'applied' | 'failed' | 'blocked';

export type MigrationEvent = 'start' | 'succeed' | 'fail' | 'block';

/**
 * Outcome of one run. Migrations another instance applied first appear in
 * neither list; blocked migrations count as failed.
 */
export interface SchemaEvolutionResult {
    applied: string[];
    failed: string[];
}
