import { and, asc, gte, lte, sql } from 'drizzle-orm';
import { SOURCE_DEFINITIONS } from '@/config/sources.js';
import type { Database } from '@/db/index.js';
import { factBingAds, factGoogleAds, type PaidSearchFactTable } from '@/db/schema.js';
import type { SourceSystem } from '@/types/sources.js';
import type { DateRange } from '@/utils/date.js';
import type { FactIdentity, FactSourceReader, NormalizedFact } from './types.js';

const identities =
    (table: PaidSearchFactTable) =>
    async (db: Database): Promise<FactIdentity[]> =>
        db
            .selectDistinct({
                externalCampaignId: sql<string>`${table.campaignId}::text`,
                campaignName: table.campaignName,
                network: table.network,
            })
            .from(table);

const facts = (table: PaidSearchFactTable) => async (db: Database, range: DateRange) => {
    const rows = await db
        .select({
            date: table.date,
            externalCampaignId: sql<string>`${table.campaignId}::text`,
            campaignName: table.campaignName,
            network: table.network,
            impressions: table.impressions,
            clicks: table.clicks,
            cost: table.cost,
            conversions: table.conversions,
        })
        .from(table)
        .where(and(gte(table.date, range.start), lte(table.date, range.end)))
        .orderBy(asc(table.date), asc(table.campaignId), asc(table.id));

    return rows.map(
        (row): NormalizedFact => ({
            ...row,
            impressions: Number(row.impressions),
            clicks: Number(row.clicks),
            cost: Number(row.cost),
            conversions: Number(row.conversions),
        })
    );
};

const paidSearchReader = (sourceSystem: SourceSystem, table: PaidSearchFactTable): FactSourceReader => ({
    definition: SOURCE_DEFINITIONS[sourceSystem],
    identities: identities(table),
    facts: facts(table),
});

export const googleAdsReader = paidSearchReader('Google Ads', factGoogleAds);

export const bingAdsReader = paidSearchReader('Bing Ads', factBingAds);
