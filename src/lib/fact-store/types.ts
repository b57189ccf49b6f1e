import type { SourceDefinition } from '@/types/sources.js';
import type { Database } from '@/db/index.js';
import type { DateRange } from '@/utils/date.js';

/** Distinct campaign identity observed in a fact table. */
export interface FactIdentity {
    externalCampaignId: string;
    campaignName: string;
    network: string | null;
}

/**
 * One fact row in common shape, before identity is applied. Sources that do
 * not report a measure carry 0 for it.
 */
export interface NormalizedFact {
    date: string;
    externalCampaignId: string;
    campaignName: string;
    network: string | null;
    impressions: number;
    clicks: number;
    cost: number;
    conversions: number;
}

export interface FactSourceReader {
    definition: SourceDefinition;
    identities: (db: Database) => Promise<FactIdentity[]>;
    facts: (db: Database, range: DateRange) => Promise<NormalizedFact[]>;
}
