import { and, asc, gte, isNotNull, lte, sql } from 'drizzle-orm';
import { SOURCE_DEFINITIONS } from '@/config/sources.js';
import type { Database } from '@/db/index.js';
import { factMatomo } from '@/db/schema.js';
import type { DateRange } from '@/utils/date.js';
import type { FactSourceReader, NormalizedFact } from './types.js';

const t = factMatomo;

// Visits without campaign parameters have no identity and are never read
const campaignName = sql<string>`coalesce(${t.campaignName}, ${t.campaignId}::text)`;

/**
 * Web analytics. Only goal conversions carry over; there is no spend, click or
 * impression data.
 */
export const matomoReader: FactSourceReader = {
    definition: SOURCE_DEFINITIONS.Matomo,

    identities: async (db: Database) => {
        const rows = await db
            .selectDistinct({ externalCampaignId: sql<string>`${t.campaignId}::text`, campaignName })
            .from(t)
            .where(isNotNull(t.campaignId));
        return rows.map(row => ({ ...row, network: null }));
    },

    facts: async (db: Database, range: DateRange) => {
        const rows = await db
            .select({
                date: t.date,
                externalCampaignId: sql<string>`${t.campaignId}::text`,
                campaignName,
                goalConversions: t.goalConversions,
            })
            .from(t)
            .where(and(isNotNull(t.campaignId), gte(t.date, range.start), lte(t.date, range.end)))
            .orderBy(asc(t.date), asc(t.campaignId), asc(t.id));

        return rows.map(
            (row): NormalizedFact => ({
                date: row.date,
                externalCampaignId: row.externalCampaignId,
                campaignName: row.campaignName,
                network: null,
                impressions: 0,
                clicks: 0,
                cost: 0,
                conversions: Number(row.goalConversions),
            })
        );
    },
};
