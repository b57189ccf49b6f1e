import type { BaseMetrics, DerivedRatios } from '@/types/metrics.js';

/** x / 0 is 0, never NaN or Infinity. */
export function safeDivide(numerator: number, denominator: number): number {
    return denominator === 0 ? 0 : numerator / denominator;
}

export function deriveRatios(metrics: BaseMetrics): DerivedRatios {
    return {
        ctr: safeDivide(metrics.clicks, metrics.impressions),
        conversionRate: safeDivide(metrics.conversions, metrics.clicks),
        costPerConversion: safeDivide(metrics.cost, metrics.conversions),
    };
}

/**
 * Running sums for one group. Cost and conversions come from numeric(_, 2)
 * columns and are summed in hundredths so the totals stay exact.
 */
export interface MetricTotals {
    impressions: number;
    clicks: number;
    costCents: number;
    conversionHundredths: number;
}

const toHundredths = (value: number): number => Math.round(value * 100);

export function emptyTotals(): MetricTotals {
    return { impressions: 0, clicks: 0, costCents: 0, conversionHundredths: 0 };
}

export function addMetrics(target: MetricTotals, source: BaseMetrics): MetricTotals {
    target.impressions += source.impressions;
    target.clicks += source.clicks;
    target.costCents += toHundredths(source.cost);
    target.conversionHundredths += toHundredths(source.conversions);
    return target;
}

export function finishTotals(totals: MetricTotals): BaseMetrics {
    return {
        impressions: totals.impressions,
        clicks: totals.clicks,
        cost: totals.costCents / 100,
        conversions: totals.conversionHundredths / 100,
    };
}
