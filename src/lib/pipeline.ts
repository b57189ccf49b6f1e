import { AggregationEngine } from '@/lib/aggregate/index.js';
import type { AppContext } from '@/lib/context.js';
import { IdentityMappingRegistry } from '@/lib/identity-mapping/registry.js';
import { IdentityResolver } from '@/lib/identity-resolver/index.js';
import type { SchemaCapabilities } from '@/lib/schema-capabilities/index.js';
import { type Migration, runSchemaEvolution, type SchemaEvolutionResult } from '@/lib/schema-evolution/index.js';
import { UnificationViewBuilder } from '@/lib/unify/index.js';
import type { IdentityMapping, MappingInput, ReorderItem, UnmappedCampaign } from '@/types/mapping.js';
import type { AggregatedPerformanceRow, AggregationSort, Dimension, UnifiedMetricRow } from '@/types/metrics.js';
import type { Platform, SourceSystem } from '@/types/sources.js';

export interface AggregatedMetricsQuery {
    start: string;
    end: string;
    platform?: Platform;
    network?: string;
    dimensions?: readonly Dimension[];
    sort?: AggregationSort;
}

/**
 * Entry point for everything outside the core. Each call is an independent unit
 * of work against the shared store.
 */
export class ReconciliationPipeline {
    readonly registry: IdentityMappingRegistry;
    readonly resolver: IdentityResolver;
    readonly unification: UnificationViewBuilder;
    readonly aggregation: AggregationEngine;

    constructor(readonly ctx: AppContext) {
        this.registry = new IdentityMappingRegistry(ctx);
        this.resolver = new IdentityResolver(ctx, this.registry);
        this.unification = new UnificationViewBuilder(ctx, this.registry);
        this.aggregation = new AggregationEngine(this.unification);
    }

    runSchemaEvolution(migrations?: Migration[]): Promise<SchemaEvolutionResult> {
        return runSchemaEvolution(this.ctx, migrations);
    }

    capabilities(): SchemaCapabilities {
        return this.ctx.capabilities.snapshot;
    }

    listUnmapped(sourceSystem?: SourceSystem): Promise<UnmappedCampaign[]> {
        return this.resolver.unmapped(sourceSystem);
    }

    upsertMapping(input: MappingInput): Promise<IdentityMapping> {
        return this.registry.upsert(input);
    }

    getMapping(id: number): Promise<IdentityMapping> {
        return this.registry.get(id);
    }

    softDeleteMapping(id: number): Promise<void> {
        return this.registry.softDelete(id);
    }

    reorderMappings(items: ReorderItem[]): Promise<void> {
        return this.registry.reorder(items);
    }

    listMappings(sourceSystem?: SourceSystem): Promise<IdentityMapping[]> {
        return this.registry.list(sourceSystem);
    }

    unifiedMetrics(start: string, end: string): Promise<UnifiedMetricRow[]> {
        return this.unification.unify({ start, end });
    }

    aggregatedMetrics(query: AggregatedMetricsQuery): Promise<AggregatedPerformanceRow[]> {
        return this.aggregation.aggregate(
            { start: query.start, end: query.end },
            {
                dimensions: query.dimensions,
                sort: query.sort,
                filters: {
                    platforms: query.platform ? [query.platform] : undefined,
                    networks: query.network ? [query.network] : undefined,
                },
            }
        );
    }
}
