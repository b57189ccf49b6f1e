import type { DateRange } from '@/utils/date.js';
import type { Platform } from './sources.js';

// ============================================================================
// Metric Types
// ============================================================================

export interface BaseMetrics {
    impressions: number;
    clicks: number;
    cost: number;
    conversions: number;
}

/**
 * Ratios are fractions (0.05, not 5) and always derived from the base
 * measures of the same row or group.
 */
export interface DerivedRatios {
    ctr: number;
    conversionRate: number;
    costPerConversion: number;
}

/**
 * One (platform, date, externalCampaignId) fact row after identity has been
 * applied.
 */
export interface UnifiedMetricRow extends BaseMetrics, DerivedRatios {
    platform: Platform;
    network: string;
    date: string;
    externalCampaignId: string;
    displayName: string;
    originalCampaignName: string;
    category: string;
    campaignType: string;
}

export const DIMENSIONS = ['platform', 'network', 'date', 'externalCampaignId', 'displayName', 'originalCampaignName', 'category', 'campaignType'] as const;
export type Dimension = (typeof DIMENSIONS)[number];

export const DEFAULT_DIMENSIONS: readonly Dimension[] = ['platform', 'network', 'externalCampaignId', 'displayName', 'category', 'campaignType', 'date'];

export const METRICS = ['impressions', 'clicks', 'cost', 'conversions', 'ctr', 'conversionRate', 'costPerConversion'] as const;
export type Metric = (typeof METRICS)[number];

export type DimensionValues = Partial<Pick<UnifiedMetricRow, Dimension>>;

/**
 * One group of unified rows. Only the grouped dimensions are present.
 */
export type AggregatedPerformanceRow = DimensionValues &
    BaseMetrics &
    DerivedRatios & {
        /** Unified rows folded into this group */
        rowCount: number;
    };

export interface AggregationFilters {
    platforms?: Platform[];
    networks?: string[];
    dateRange?: DateRange;
}

export interface AggregationSort {
    by: Dimension | Metric;
    direction: 'asc' | 'desc';
}

export const DEFAULT_SORT: AggregationSort = { by: 'cost', direction: 'desc' };

export interface AggregationOptions {
    dimensions?: readonly Dimension[];
    filters?: AggregationFilters;
    sort?: AggregationSort;
}
