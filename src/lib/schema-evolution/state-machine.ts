import type { MigrationEvent, MigrationState } from './types.js';

const TRANSITIONS: Record<MigrationState, Partial<Record<MigrationEvent, MigrationState>>> = {
    pending: { start: 'applying', block: 'blocked' },
    applying: { succeed: 'applied', fail: 'failed' },
    applied: {},
    failed: {},
    blocked: {},
};

/**
 * Advance a migration's state. Throws on transitions the lifecycle does not
 * allow, e.g. applying a migration twice in one run.
 */
export function transition(state: MigrationState, event: MigrationEvent): MigrationState {
    const next = TRANSITIONS[state][event];
    if (!next) {
        throw new Error(`Invalid migration transition: ${state} -> ${event}`);
    }
    return next;
}

/** Dependents of a migration in one of these states never start. */
export function blocksDependents(state: MigrationState | undefined): boolean {
    return state !== 'applied';
}
