import { describe, expect, it } from 'vitest';
import { addMetrics, deriveRatios, emptyTotals, finishTotals, safeDivide } from './ratios';

describe('safeDivide', () => {
    it('returns 0 for a zero denominator', () => {
        expect(safeDivide(5, 0)).toBe(0);
        expect(safeDivide(0, 0)).toBe(0);
    });

    it('divides normally otherwise', () => {
        expect(safeDivide(50, 1000)).toBe(0.05);
    });
});

describe('deriveRatios', () => {
    it('derives fractions from base measures', () => {
        expect(deriveRatios({ impressions: 1000, clicks: 50, cost: 100, conversions: 5 })).toEqual({
            ctr: 0.05,
            conversionRate: 0.1,
            costPerConversion: 20,
        });
    });

    it('zeroes every ratio whose denominator is zero', () => {
        expect(deriveRatios({ impressions: 0, clicks: 0, cost: 12.5, conversions: 0 })).toEqual({
            ctr: 0,
            conversionRate: 0,
            costPerConversion: 0,
        });
    });
});

describe('addMetrics', () => {
    it('accumulates money in cents and converts back once', () => {
        const totals = emptyTotals();
        addMetrics(totals, { impressions: 1, clicks: 1, cost: 0.1, conversions: 0 });
        addMetrics(totals, { impressions: 2, clicks: 0, cost: 0.2, conversions: 1.5 });

        expect(totals).toEqual({ impressions: 3, clicks: 1, costCents: 30, conversionHundredths: 150 });
        expect(finishTotals(totals)).toEqual({ impressions: 3, clicks: 1, cost: 0.3, conversions: 1.5 });
    });
});
