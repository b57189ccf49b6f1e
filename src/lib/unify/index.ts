import { listSources } from '@/config/sources.js';
import type { AppContext } from '@/lib/context.js';
import type { PartialSourceFailure } from '@/lib/errors.js';
import { readSource, reportPartialFailures } from '@/lib/fact-store/index.js';
import type { IdentityMappingRegistry } from '@/lib/identity-mapping/registry.js';
import { mappingKey } from '@/types/mapping.js';
import type { UnifiedMetricRow } from '@/types/metrics.js';
import type { SourceSystem } from '@/types/sources.js';
import type { DateRange } from '@/utils/date.js';
import { toUnifiedRow } from './convert.js';

export { toUnifiedRow } from './convert.js';

/**
 * Builds the unified metric view over every source's facts. Mappings are
 * loaded once per call; each source is read independently.
 */
export class UnificationViewBuilder {
    constructor(
        private readonly ctx: AppContext,
        private readonly registry: IdentityMappingRegistry
    ) {}

    async unify(range: DateRange, sourceSystems?: SourceSystem[]): Promise<UnifiedMetricRow[]> {
        const mappings = await this.registry.activeIndex();
        const sources = listSources().filter(source => !sourceSystems || sourceSystems.includes(source.sourceSystem));

        const reads = await Promise.all(sources.map(source => readSource(this.ctx, source, 'read facts', (reader, db) => reader.facts(db, range))));

        const failures: PartialSourceFailure[] = [];
        const rows: UnifiedMetricRow[] = [];

        for (const read of reads) {
            if (!read.ok) {
                failures.push(read.failure);
                continue;
            }
            for (const fact of read.rows) {
                rows.push(toUnifiedRow(read.source, fact, mappings.get(mappingKey(read.source.sourceSystem, fact.externalCampaignId))));
            }
        }

        reportPartialFailures(this.ctx, 'unify', failures);
        return rows;
    }
}
