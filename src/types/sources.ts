// ============================================================================
// Source Catalog Types
// ============================================================================

/** Source systems in their fixed resolution order. */
export const SOURCE_SYSTEMS = ['Google Ads', 'Bing Ads', 'RedTrack', 'Matomo'] as const;
export type SourceSystem = (typeof SOURCE_SYSTEMS)[number];

export const PLATFORMS = ['google_ads', 'bing_ads', 'redtrack', 'matomo'] as const;
export type Platform = (typeof PLATFORMS)[number];

/**
 * Static description of one source system's fact table.
 */
export interface SourceDefinition {
    sourceSystem: SourceSystem;

    /** Platform key carried on every unified row */
    platform: Platform;

    /** Fact table written by the ingestion job for this source */
    factTable: string;

    /** Whether the source reports impressions (affiliate and analytics do not) */
    reportsImpressions: boolean;

    /** Whether fact rows carry a network column */
    reportsNetwork: boolean;
}
