import { describe, expect, it } from 'vitest';
import { deriveRatios } from '@/lib/metrics/ratios';
import type { BaseMetrics, UnifiedMetricRow } from '@/types/metrics';
import { aggregateRows } from './index';

const unified = (overrides: Partial<UnifiedMetricRow> & BaseMetrics): UnifiedMetricRow => {
    const row = {
        platform: 'google_ads' as const,
        network: 'Search',
        date: '2025-03-10',
        externalCampaignId: '123',
        displayName: 'Brand – US',
        originalCampaignName: 'Brand Campaign',
        category: 'Brand',
        campaignType: 'Search',
        ...overrides,
    };
    return { ...row, ...deriveRatios(row) };
};

describe('aggregateRows', () => {
    it('returns the unified row unchanged for a single day', () => {
        const row = unified({ impressions: 1000, clicks: 50, cost: 100, conversions: 5 });

        const [aggregated] = aggregateRows([row]);

        expect(aggregated).toEqual({
            platform: 'google_ads',
            network: 'Search',
            externalCampaignId: '123',
            displayName: 'Brand – US',
            category: 'Brand',
            campaignType: 'Search',
            date: '2025-03-10',
            impressions: 1000,
            clicks: 50,
            cost: 100,
            conversions: 5,
            ctr: 0.05,
            conversionRate: 0.1,
            costPerConversion: 20,
            rowCount: 1,
        });
    });

    it('derives CTR from summed clicks and impressions rather than averaging daily CTRs', () => {
        const rows = [
            unified({ date: '2025-03-10', impressions: 1000, clicks: 10, cost: 10, conversions: 1 }),
            unified({ date: '2025-03-11', impressions: 100, clicks: 10, cost: 30, conversions: 1 }),
        ];

        const [aggregated] = aggregateRows(rows, { dimensions: ['externalCampaignId'] });

        const meanOfDailyCtr = (0.01 + 0.1) / 2;
        expect(aggregated?.impressions).toBe(1100);
        expect(aggregated?.clicks).toBe(20);
        expect(aggregated?.ctr).toBeCloseTo(20 / 1100, 12);
        expect(aggregated?.ctr).not.toBeCloseTo(meanOfDailyCtr, 3);
        expect(aggregated?.conversionRate).toBe(0.1);
        expect(aggregated?.costPerConversion).toBe(20);
        expect(aggregated?.rowCount).toBe(2);
        expect(aggregated).not.toHaveProperty('date');
    });

    it('applies platform, network and date filters before grouping', () => {
        const rows = [
            unified({ date: '2025-03-10', impressions: 100, clicks: 10, cost: 5, conversions: 1 }),
            unified({ date: '2025-03-12', impressions: 100, clicks: 10, cost: 5, conversions: 1 }),
            unified({ platform: 'bing_ads', impressions: 500, clicks: 5, cost: 50, conversions: 0 }),
            unified({ network: 'Display', impressions: 900, clicks: 1, cost: 9, conversions: 0 }),
        ];

        const result = aggregateRows(rows, {
            dimensions: ['platform'],
            filters: { platforms: ['google_ads'], networks: ['Search'], dateRange: { start: '2025-03-10', end: '2025-03-11' } },
        });

        expect(result).toEqual([
            {
                platform: 'google_ads',
                impressions: 100,
                clicks: 10,
                cost: 5,
                conversions: 1,
                ctr: 0.1,
                conversionRate: 0.1,
                costPerConversion: 5,
                rowCount: 1,
            },
        ]);
    });

    it('orders by descending cost by default with a stable tie-break', () => {
        const rows = [
            unified({ externalCampaignId: 'b', impressions: 0, clicks: 0, cost: 10, conversions: 0 }),
            unified({ externalCampaignId: 'c', impressions: 0, clicks: 0, cost: 40, conversions: 0 }),
            unified({ externalCampaignId: 'a', impressions: 0, clicks: 0, cost: 10, conversions: 0 }),
        ];

        const result = aggregateRows(rows, { dimensions: ['externalCampaignId'] });

        expect(result.map(row => row.externalCampaignId)).toEqual(['c', 'a', 'b']);
    });

    it('honours a caller-specified sort', () => {
        const rows = [
            unified({ externalCampaignId: 'x', impressions: 300, clicks: 3, cost: 1, conversions: 0 }),
            unified({ externalCampaignId: 'y', impressions: 100, clicks: 1, cost: 2, conversions: 0 }),
            unified({ externalCampaignId: 'z', impressions: 200, clicks: 2, cost: 3, conversions: 0 }),
        ];

        const result = aggregateRows(rows, { dimensions: ['externalCampaignId'], sort: { by: 'impressions', direction: 'asc' } });

        expect(result.map(row => row.externalCampaignId)).toEqual(['y', 'z', 'x']);
    });

    it('keeps ratios at zero when a group has zero denominators', () => {
        const rows = [unified({ platform: 'redtrack', impressions: 0, clicks: 0, cost: 25, conversions: 0 })];

        const [aggregated] = aggregateRows(rows, { dimensions: ['platform'] });

        expect(aggregated).toMatchObject({ ctr: 0, conversionRate: 0, costPerConversion: 0, cost: 25 });
    });

    it('keeps summed cost and conversions exact in hundredths', () => {
        const rows = [
            unified({ date: '2025-03-10', impressions: 10, clicks: 2, cost: 0.1, conversions: 0.1 }),
            unified({ date: '2025-03-11', impressions: 10, clicks: 2, cost: 0.2, conversions: 0.2 }),
        ];

        const [aggregated] = aggregateRows(rows, { dimensions: ['externalCampaignId'] });

        expect(aggregated?.cost).toBe(0.3);
        expect(aggregated?.conversions).toBe(0.3);
        expect(aggregated?.costPerConversion).toBe(1);
    });
});
