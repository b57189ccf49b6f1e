import { UNKNOWN_NETWORK, UNMAPPED_CAMPAIGN_TYPE, UNMAPPED_CATEGORY } from '@/config/sources.js';
import type { NormalizedFact } from '@/lib/fact-store/index.js';
import { deriveRatios } from '@/lib/metrics/ratios.js';
import type { IdentityMapping } from '@/types/mapping.js';
import type { UnifiedMetricRow } from '@/types/metrics.js';
import type { SourceDefinition } from '@/types/sources.js';

/**
 * Apply identity to one normalized fact. Without a mapping the row keeps its
 * source name and lands in the Uncategorized bucket.
 */
export function toUnifiedRow(source: SourceDefinition, fact: NormalizedFact, mapping: IdentityMapping | undefined): UnifiedMetricRow {
    const base = {
        impressions: source.reportsImpressions ? fact.impressions : 0,
        clicks: fact.clicks,
        cost: fact.cost,
        conversions: fact.conversions,
    };

    return {
        platform: source.platform,
        network: mapping?.network ?? fact.network ?? UNKNOWN_NETWORK,
        date: fact.date,
        externalCampaignId: fact.externalCampaignId,
        displayName: mapping?.displayName ?? fact.campaignName,
        originalCampaignName: fact.campaignName,
        category: mapping?.category ?? UNMAPPED_CATEGORY,
        campaignType: mapping?.campaignType ?? UNMAPPED_CAMPAIGN_TYPE,
        ...base,
        ...deriveRatios(base),
    };
}
