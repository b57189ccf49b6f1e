import type { Platform, SourceDefinition, SourceSystem } from '@/types/sources.js';
import { SOURCE_SYSTEMS } from '@/types/sources.js';

/**
 * Fact sources read by the pipeline. Each table is owned by its ingestion job;
 * this service only reads from them.
 */
export const SOURCE_DEFINITIONS: Record<SourceSystem, SourceDefinition> = {
    'Google Ads': {
        sourceSystem: 'Google Ads',
        platform: 'google_ads',
        factTable: 'fact_google_ads',
        reportsImpressions: true,
        reportsNetwork: true,
    },
    'Bing Ads': {
        sourceSystem: 'Bing Ads',
        platform: 'bing_ads',
        factTable: 'fact_bing_ads',
        reportsImpressions: true,
        reportsNetwork: true,
    },
    RedTrack: {
        sourceSystem: 'RedTrack',
        platform: 'redtrack',
        factTable: 'fact_redtrack',
        reportsImpressions: false,
        reportsNetwork: false,
    },
    Matomo: {
        sourceSystem: 'Matomo',
        platform: 'matomo',
        factTable: 'fact_matomo',
        reportsImpressions: false,
        reportsNetwork: false,
    },
};

/** Placeholders used when a fact row has no active mapping. */
export const UNMAPPED_CATEGORY = 'Uncategorized';
export const UNMAPPED_CAMPAIGN_TYPE = 'Uncategorized';
export const UNKNOWN_NETWORK = 'Unknown';

export function listSources(sourceSystem?: SourceSystem): SourceDefinition[] {
    if (sourceSystem) {
        return [SOURCE_DEFINITIONS[sourceSystem]];
    }
    return SOURCE_SYSTEMS.map(source => SOURCE_DEFINITIONS[source]);
}

export function sourceForPlatform(platform: Platform): SourceDefinition {
    const match = SOURCE_SYSTEMS.map(source => SOURCE_DEFINITIONS[source]).find(definition => definition.platform === platform);
    if (!match) {
        throw new Error(`No source configured for platform ${platform}`);
    }
    return match;
}
