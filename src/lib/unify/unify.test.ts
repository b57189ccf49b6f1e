import { afterEach, describe, expect, it } from 'vitest';
import { createTestPipeline, type TestPipeline } from '@/test/database';
import { seedFacts } from '@/test/facts';

describe('UnificationViewBuilder', () => {
    let harness: TestPipeline | undefined;

    afterEach(async () => {
        await harness?.close();
        harness = undefined;
    });

    it('applies the active mapping and derives ratios', async () => {
        harness = await createTestPipeline();
        await seedFacts.googleAds(harness.db, [
            { date: '2025-03-10', campaignId: 123, campaignName: 'Brand Campaign', network: 'Search', impressions: 1000, clicks: 50, cost: '100.00', conversions: '5' },
        ]);
        await harness.pipeline.upsertMapping({
            sourceSystem: 'Google Ads',
            externalCampaignId: '123',
            displayName: 'Brand – US',
            category: 'Brand',
            campaignType: 'Search',
        });

        const rows = await harness.pipeline.unifiedMetrics('2025-03-10', '2025-03-10');

        expect(rows).toEqual([
            {
                platform: 'google_ads',
                network: 'Search',
                date: '2025-03-10',
                externalCampaignId: '123',
                displayName: 'Brand – US',
                originalCampaignName: 'Brand Campaign',
                category: 'Brand',
                campaignType: 'Search',
                impressions: 1000,
                clicks: 50,
                cost: 100,
                conversions: 5,
                ctr: 0.05,
                conversionRate: 0.1,
                costPerConversion: 20,
            },
        ]);
    });

    it('falls back to the source name and Uncategorized without a mapping', async () => {
        harness = await createTestPipeline();
        await seedFacts.bingAds(harness.db, [
            { date: '2025-03-10', campaignId: 77, campaignName: 'Bing Generic', network: null, impressions: 0, clicks: 0, cost: '3.50', conversions: '0' },
        ]);

        const [row] = await harness.pipeline.unifiedMetrics('2025-03-01', '2025-03-31');

        expect(row).toMatchObject({
            platform: 'bing_ads',
            network: 'Unknown',
            displayName: 'Bing Generic',
            category: 'Uncategorized',
            campaignType: 'Uncategorized',
            cost: 3.5,
            ctr: 0,
            conversionRate: 0,
            costPerConversion: 0,
        });
    });

    it('prefers the mapping network over the fact network', async () => {
        harness = await createTestPipeline();
        await seedFacts.googleAds(harness.db, [{ date: '2025-03-10', campaignId: 5, campaignName: 'Five', network: 'Search' }]);
        await harness.pipeline.upsertMapping({ sourceSystem: 'Google Ads', externalCampaignId: '5', displayName: 'Five', network: 'Performance Max' });

        const [row] = await harness.pipeline.unifiedMetrics('2025-03-10', '2025-03-10');

        expect(row?.network).toBe('Performance Max');
    });

    it('ignores soft-deleted mappings', async () => {
        harness = await createTestPipeline();
        await seedFacts.googleAds(harness.db, [{ date: '2025-03-10', campaignId: 5, campaignName: 'Five', network: 'Search' }]);
        const mapping = await harness.pipeline.upsertMapping({ sourceSystem: 'Google Ads', externalCampaignId: '5', displayName: 'Mapped Five', category: 'Brand' });
        await harness.pipeline.softDeleteMapping(mapping.id);

        const [row] = await harness.pipeline.unifiedMetrics('2025-03-10', '2025-03-10');

        expect(row).toMatchObject({ displayName: 'Five', category: 'Uncategorized' });
    });

    it('normalizes affiliate and analytics facts into the common shape', async () => {
        harness = await createTestPipeline();
        await seedFacts.redtrack(harness.db, [{ date: '2025-03-10', campaignId: 31, campaignName: 'Affiliate Push', clicks: 200, conversions: 10, cost: '50.00' }]);
        await seedFacts.matomo(harness.db, [
            { date: '2025-03-10', campaignId: 41, campaignName: 'Newsletter', visits: 900, goalConversions: 12 },
            { date: '2025-03-10', campaignId: null, campaignName: null, visits: 4000, goalConversions: 30 },
        ]);

        const rows = await harness.pipeline.unifiedMetrics('2025-03-10', '2025-03-10');

        expect(rows).toEqual([
            {
                platform: 'redtrack',
                network: 'Unknown',
                date: '2025-03-10',
                externalCampaignId: '31',
                displayName: 'Affiliate Push',
                originalCampaignName: 'Affiliate Push',
                category: 'Uncategorized',
                campaignType: 'Uncategorized',
                impressions: 0,
                clicks: 200,
                cost: 50,
                conversions: 10,
                ctr: 0,
                conversionRate: 0.05,
                costPerConversion: 5,
            },
            {
                platform: 'matomo',
                network: 'Unknown',
                date: '2025-03-10',
                externalCampaignId: '41',
                displayName: 'Newsletter',
                originalCampaignName: 'Newsletter',
                category: 'Uncategorized',
                campaignType: 'Uncategorized',
                impressions: 0,
                clicks: 0,
                cost: 0,
                conversions: 12,
                ctr: 0,
                conversionRate: 0,
                costPerConversion: 0,
            },
        ]);
    });

    it('only returns facts inside the date range', async () => {
        harness = await createTestPipeline();
        await seedFacts.googleAds(harness.db, [
            { date: '2025-03-09', campaignId: 1, campaignName: 'One', network: 'Search' },
            { date: '2025-03-10', campaignId: 1, campaignName: 'One', network: 'Search' },
            { date: '2025-03-12', campaignId: 1, campaignName: 'One', network: 'Search' },
        ]);

        const rows = await harness.pipeline.unifiedMetrics('2025-03-10', '2025-03-11');

        expect(rows.map(row => row.date)).toEqual(['2025-03-10']);
    });

    it('returns the readable sources when one fact table is missing', async () => {
        harness = await createTestPipeline({ factTables: ['Google Ads', 'RedTrack'] });
        await seedFacts.googleAds(harness.db, [{ date: '2025-03-10', campaignId: 1, campaignName: 'One', network: 'Search' }]);
        await seedFacts.redtrack(harness.db, [{ date: '2025-03-10', campaignId: 2, campaignName: 'Two' }]);

        const rows = await harness.pipeline.unifiedMetrics('2025-03-10', '2025-03-10');

        expect(rows.map(row => row.platform)).toEqual(['google_ads', 'redtrack']);
        expect(harness.logger.records.filter(record => record.level === 'warn')).toHaveLength(1);
    });
});

describe('aggregatedMetrics', () => {
    let harness: TestPipeline | undefined;

    afterEach(async () => {
        await harness?.close();
        harness = undefined;
    });

    it('rolls two days up into one row with ratios from the sums', async () => {
        harness = await createTestPipeline();
        await seedFacts.googleAds(harness.db, [
            { date: '2025-03-10', campaignId: 123, campaignName: 'Brand Campaign', network: 'Search', impressions: 1000, clicks: 50, cost: '100.00', conversions: '5' },
            { date: '2025-03-11', campaignId: 123, campaignName: 'Brand Campaign', network: 'Search', impressions: 200, clicks: 30, cost: '60.00', conversions: '3' },
        ]);
        await seedFacts.bingAds(harness.db, [{ date: '2025-03-10', campaignId: 9, campaignName: 'Bing', network: 'Search', impressions: 10, clicks: 1, cost: '1.00' }]);

        const rows = await harness.pipeline.aggregatedMetrics({
            start: '2025-03-10',
            end: '2025-03-11',
            platform: 'google_ads',
            dimensions: ['platform', 'externalCampaignId'],
        });

        expect(rows).toEqual([
            {
                platform: 'google_ads',
                externalCampaignId: '123',
                impressions: 1200,
                clicks: 80,
                cost: 160,
                conversions: 8,
                ctr: 80 / 1200,
                conversionRate: 0.1,
                costPerConversion: 20,
                rowCount: 2,
            },
        ]);
    });

    it('sums cost to the exact cent across days', async () => {
        harness = await createTestPipeline();
        await seedFacts.googleAds(harness.db, [
            { date: '2025-03-10', campaignId: 123, campaignName: 'Brand Campaign', network: 'Search', impressions: 100, clicks: 1, cost: '0.10', conversions: '1' },
            { date: '2025-03-11', campaignId: 123, campaignName: 'Brand Campaign', network: 'Search', impressions: 100, clicks: 1, cost: '0.20', conversions: '1' },
        ]);

        const [row] = await harness.pipeline.aggregatedMetrics({ start: '2025-03-10', end: '2025-03-11', dimensions: ['externalCampaignId'] });

        expect(row?.cost).toBe(0.3);
        expect(row?.conversions).toBe(2);
        expect(row?.costPerConversion).toBe(0.15);
    });
});
