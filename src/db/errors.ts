/**
 * Classification of errors raised by the store. Drizzle wraps driver errors, so
 * every check walks the cause chain looking for a SQLSTATE or driver code.
 */

// SQLSTATE class 08 is matched by prefix below.
const CONNECTION_ERROR_CODES = new Set([
    // postgres.js
    'CONNECTION_CLOSED',
    'CONNECTION_ENDED',
    'CONNECTION_DESTROYED',
    'CONNECT_TIMEOUT',
    // node sockets
    'ECONNRESET',
    'ECONNREFUSED',
    'EPIPE',
    'ETIMEDOUT',
    // admin_shutdown, crash_shutdown, cannot_connect_now
    '57P01',
    '57P02',
    '57P03',
]);

// unique_violation (racing catalog inserts), duplicate_table, duplicate_column, duplicate_object, duplicate_schema
const CONFLICT_RACE_CODES = new Set(['23505', '42P07', '42701', '42710', '42P06']);

// undefined_table, undefined_column
const MISSING_RELATION_CODES = new Set(['42P01', '42703']);

const MAX_CAUSE_DEPTH = 5;

function* errorChain(error: unknown): Generator<object> {
    let current: unknown = error;
    for (let depth = 0; depth < MAX_CAUSE_DEPTH && typeof current === 'object' && current !== null; depth++) {
        yield current;
        current = 'cause' in current ? current.cause : undefined;
    }
}

export function errorCodes(error: unknown): string[] {
    const codes: string[] = [];
    for (const link of errorChain(error)) {
        if ('code' in link && typeof link.code === 'string') {
            codes.push(link.code);
        }
    }
    return codes;
}

export function isConnectionError(error: unknown): boolean {
    return errorCodes(error).some(code => CONNECTION_ERROR_CODES.has(code) || code.startsWith('08'));
}

/**
 * A DDL or bootstrap statement lost a race against another instance doing the
 * same thing. The object exists either way.
 */
export function isConflictRaceError(error: unknown): boolean {
    return errorCodes(error).some(code => CONFLICT_RACE_CODES.has(code));
}

export function isMissingRelationError(error: unknown): boolean {
    return errorCodes(error).some(code => MISSING_RELATION_CODES.has(code));
}

export function describeError(error: unknown): string {
    const messages: string[] = [];
    for (const link of errorChain(error)) {
        if (link instanceof Error && !messages.includes(link.message)) {
            messages.push(link.message);
        }
    }
    return messages.length > 0 ? messages.join(': ') : String(error);
}
