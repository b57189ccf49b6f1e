import { describeError, isConnectionError, isMissingRelationError } from '@/db/errors.js';
import type { Database } from '@/db/index.js';
import type { AppContext } from '@/lib/context.js';
import { PartialSourceFailure, StoreUnavailableError } from '@/lib/errors.js';
import type { SourceDefinition, SourceSystem } from '@/types/sources.js';
import { matomoReader } from './matomo.js';
import { bingAdsReader, googleAdsReader } from './paid-search.js';
import { redtrackReader } from './redtrack.js';
import type { FactSourceReader } from './types.js';

export type { FactIdentity, FactSourceReader, NormalizedFact } from './types.js';

export const FACT_READERS: Record<SourceSystem, FactSourceReader> = {
    'Google Ads': googleAdsReader,
    'Bing Ads': bingAdsReader,
    RedTrack: redtrackReader,
    Matomo: matomoReader,
};

export type SourceReadResult<T> = { ok: true; source: SourceDefinition; rows: T[] } | { ok: false; source: SourceDefinition; failure: PartialSourceFailure };

/**
 * Read from one source's fact table. A missing or unreadable table degrades to
 * a PartialSourceFailure; an unreachable store does not.
 */
export async function readSource<T>(ctx: AppContext, source: SourceDefinition, label: string, read: (reader: FactSourceReader, db: Database) => Promise<T[]>): Promise<SourceReadResult<T>> {
    if (!(await ctx.capabilities.hasFactTable(source.sourceSystem))) {
        return { ok: false, source, failure: new PartialSourceFailure(source.sourceSystem, `${source.factTable} does not exist`) };
    }

    try {
        const rows = await ctx.run(`${label} (${source.sourceSystem})`, db => read(FACT_READERS[source.sourceSystem], db));
        return { ok: true, source, rows };
    } catch (error) {
        if (error instanceof StoreUnavailableError || isConnectionError(error)) {
            throw error;
        }
        if (isMissingRelationError(error)) {
            // Dropped since the last probe
            await ctx.capabilities.refresh();
        }
        return { ok: false, source, failure: new PartialSourceFailure(source.sourceSystem, describeError(error), { cause: error }) };
    }
}

/**
 * One aggregate warning per pass rather than one per source.
 */
export function reportPartialFailures(ctx: AppContext, operation: string, failures: PartialSourceFailure[]): void {
    if (failures.length === 0) {
        return;
    }
    ctx.logger.warn(
        { component: 'fact-store', operation, sources: failures.map(failure => failure.sourceSystem) },
        `Skipped unreadable sources: ${failures.map(failure => failure.message).join('; ')}`
    );
}
