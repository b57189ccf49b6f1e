import { listSources } from '@/config/sources.js';
import type { AppContext } from '@/lib/context.js';
import type { PartialSourceFailure } from '@/lib/errors.js';
import { type FactIdentity, readSource, reportPartialFailures } from '@/lib/fact-store/index.js';
import type { IdentityMappingRegistry } from '@/lib/identity-mapping/registry.js';
import { mappingKey, type UnmappedCampaign } from '@/types/mapping.js';
import type { SourceSystem } from '@/types/sources.js';

const compare = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const byNameThenId = (a: FactIdentity, b: FactIdentity) =>
    compare(a.campaignName, b.campaignName) || compare(a.externalCampaignId, b.externalCampaignId) || compare(a.network ?? '', b.network ?? '');

/**
 * Finds fact identities that no active mapping covers. Keyed on
 * (sourceSystem, externalCampaignId) only, so a campaign renamed in its source
 * stays mapped.
 */
export class IdentityResolver {
    constructor(
        private readonly ctx: AppContext,
        private readonly registry: IdentityMappingRegistry
    ) {}

    async unmapped(sourceSystem?: SourceSystem): Promise<UnmappedCampaign[]> {
        const mapped = await this.registry.activeIndex(sourceSystem);

        const reads = await Promise.all(listSources(sourceSystem).map(source => readSource(this.ctx, source, 'read fact identities', (reader, db) => reader.identities(db))));

        const failures: PartialSourceFailure[] = [];
        const unmapped: UnmappedCampaign[] = [];

        for (const read of reads) {
            if (!read.ok) {
                failures.push(read.failure);
                continue;
            }

            const source = read.source.sourceSystem;
            const identities = read.rows.filter(identity => !mapped.has(mappingKey(source, identity.externalCampaignId))).sort(byNameThenId);

            for (const identity of identities) {
                unmapped.push({ sourceSystem: source, ...identity });
            }
        }

        reportPartialFailures(this.ctx, 'unmapped', failures);
        return unmapped;
    }
}
