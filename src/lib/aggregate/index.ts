import { sourceForPlatform } from '@/config/sources.js';
import { addMetrics, deriveRatios, emptyTotals, finishTotals, type MetricTotals } from '@/lib/metrics/ratios.js';
import type { UnificationViewBuilder } from '@/lib/unify/index.js';
import {
    type AggregatedPerformanceRow,
    type AggregationFilters,
    type AggregationOptions,
    type AggregationSort,
    DEFAULT_DIMENSIONS,
    DEFAULT_SORT,
    type Dimension,
    type DimensionValues,
    type UnifiedMetricRow,
} from '@/types/metrics.js';
import { type DateRange, isWithinRange } from '@/utils/date.js';

interface Group {
    key: string;
    dimensions: DimensionValues;
    totals: MetricTotals;
    rowCount: number;
}

function copyDimension<K extends Dimension>(target: DimensionValues, row: UnifiedMetricRow, key: K): void {
    target[key] = row[key];
}

export function matchesFilters(row: UnifiedMetricRow, filters: AggregationFilters): boolean {
    if (filters.platforms && filters.platforms.length > 0 && !filters.platforms.includes(row.platform)) {
        return false;
    }
    if (filters.networks && filters.networks.length > 0 && !filters.networks.includes(row.network)) {
        return false;
    }
    if (filters.dateRange && !isWithinRange(row.date, filters.dateRange)) {
        return false;
    }
    return true;
}

const compareValues = (a: string | number | undefined, b: string | number | undefined): number => {
    if (a === b) return 0;
    if (a === undefined) return -1;
    if (b === undefined) return 1;
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    return String(a) < String(b) ? -1 : 1;
};

/**
 * Group unified rows by `dimensions`, sum the base measures and derive ratios
 * from the sums. Never averages per-row ratios.
 */
export function aggregateRows(rows: UnifiedMetricRow[], options: AggregationOptions = {}): AggregatedPerformanceRow[] {
    const dimensions = options.dimensions ?? DEFAULT_DIMENSIONS;
    const filters = options.filters ?? {};
    const sort: AggregationSort = options.sort ?? DEFAULT_SORT;

    const groups = new Map<string, Group>();

    for (const row of rows) {
        if (!matchesFilters(row, filters)) {
            continue;
        }

        const key = JSON.stringify(dimensions.map(dimension => row[dimension]));
        let group = groups.get(key);
        if (!group) {
            const values: DimensionValues = {};
            for (const dimension of dimensions) {
                copyDimension(values, row, dimension);
            }
            group = { key, dimensions: values, totals: emptyTotals(), rowCount: 0 };
            groups.set(key, group);
        }

        addMetrics(group.totals, row);
        group.rowCount++;
    }

    const direction = sort.direction === 'asc' ? 1 : -1;
    const ordered = [...groups.values()]
        .map(group => {
            const totals = finishTotals(group.totals);
            return {
                key: group.key,
                row: { ...group.dimensions, ...totals, ...deriveRatios(totals), rowCount: group.rowCount },
            };
        })
        .sort((a, b) => direction * compareValues(a.row[sort.by], b.row[sort.by]) || compareValues(a.key, b.key));

    return ordered.map(entry => entry.row);
}

/**
 * Aggregated view over unification for a date range.
 */
export class AggregationEngine {
    constructor(private readonly unification: UnificationViewBuilder) {}

    async aggregate(range: DateRange, options: AggregationOptions = {}): Promise<AggregatedPerformanceRow[]> {
        // Unread sources cost nothing; the platform filter still runs on the rows
        const platforms = options.filters?.platforms;
        const sources = platforms && platforms.length > 0 ? platforms.map(platform => sourceForPlatform(platform).sourceSystem) : undefined;
        const rows = await this.unification.unify(range, sources);
        return aggregateRows(rows, options);
    }
}
