import { and, asc, gte, lte, sql } from 'drizzle-orm';
import { SOURCE_DEFINITIONS } from '@/config/sources.js';
import type { Database } from '@/db/index.js';
import { factRedtrack } from '@/db/schema.js';
import type { DateRange } from '@/utils/date.js';
import type { FactSourceReader, NormalizedFact } from './types.js';

const t = factRedtrack;

/**
 * Affiliate tracker. Reports clicks, conversions and cost but no impressions
 * and no network.
 */
export const redtrackReader: FactSourceReader = {
    definition: SOURCE_DEFINITIONS.RedTrack,

    identities: async (db: Database) => {
        const rows = await db
            .selectDistinct({ externalCampaignId: sql<string>`${t.campaignId}::text`, campaignName: t.campaignName })
            .from(t);
        return rows.map(row => ({ ...row, network: null }));
    },

    facts: async (db: Database, range: DateRange) => {
        const rows = await db
            .select({
                date: t.date,
                externalCampaignId: sql<string>`${t.campaignId}::text`,
                campaignName: t.campaignName,
                clicks: t.clicks,
                cost: t.cost,
                conversions: t.conversions,
            })
            .from(t)
            .where(and(gte(t.date, range.start), lte(t.date, range.end)))
            .orderBy(asc(t.date), asc(t.campaignId), asc(t.id));

        return rows.map(
            (row): NormalizedFact => ({
                date: row.date,
                externalCampaignId: row.externalCampaignId,
                campaignName: row.campaignName,
                network: null,
                impressions: 0,
                clicks: Number(row.clicks),
                cost: Number(row.cost),
                conversions: Number(row.conversions),
            })
        );
    },
};
