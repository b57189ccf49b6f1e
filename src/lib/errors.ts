import type { SourceSystem } from '@/types/sources.js';

export type ReconciliationErrorCode = 'NOT_FOUND' | 'CONFLICT_RACE' | 'STORE_UNAVAILABLE' | 'PARTIAL_SOURCE_FAILURE' | 'MIGRATION_FAILURE';

/**
 * Base class for failures the pipeline reports by kind. Callers switch on `code`.
 */
export abstract class ReconciliationError extends Error {
    abstract readonly code: ReconciliationErrorCode;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Operating on a mapping id that does not exist. */
export class NotFoundError extends ReconciliationError {
    readonly code = 'NOT_FOUND';

    constructor(
        readonly entity: string,
        readonly id: number | string
    ) {
        super(`${entity} ${id} not found`);
    }
}

/**
 * Lost an idempotent create race to another instance. Internal only: every
 * caller that can see one treats it as success.
 */
export class ConflictRaceError extends ReconciliationError {
    readonly code = 'CONFLICT_RACE';

    constructor(
        readonly operation: string,
        options?: ErrorOptions
    ) {
        super(`Lost race while running ${operation}`, options);
    }
}

/** Connection or timeout failures that survived every retry. */
export class StoreUnavailableError extends ReconciliationError {
    readonly code = 'STORE_UNAVAILABLE';
}

/** One source's facts could not be read. The source contributes nothing. */
export class PartialSourceFailure extends ReconciliationError {
    readonly code = 'PARTIAL_SOURCE_FAILURE';

    constructor(
        readonly sourceSystem: SourceSystem,
        reason: string,
        options?: ErrorOptions
    ) {
        super(`${sourceSystem}: ${reason}`, options);
    }
}

/** One migration's statements failed. Recorded and skipped. */
export class MigrationFailure extends ReconciliationError {
    readonly code = 'MIGRATION_FAILURE';

    constructor(
        readonly migrationName: string,
        reason: string,
        options?: ErrorOptions
    ) {
        super(`Migration ${migrationName} failed: ${reason}`, options);
    }
}
