import { and, asc, eq, sql } from 'drizzle-orm';
import { campaignIdentityMapping } from '@/db/schema.js';
import type { AppContext } from '@/lib/context.js';
import { NotFoundError, StoreUnavailableError } from '@/lib/errors.js';
import { MAPPING_TABLE, type OptionalMappingColumn } from '@/lib/schema-capabilities/index.js';
import { MAPPING_COLUMN_DEFINITIONS, addColumnIfMissing } from '@/lib/schema-evolution/columns.js';
import type { IdentityMapping, MappingInput, ReorderItem } from '@/types/mapping.js';
import { mappingInputSchema, mappingKey, reorderItemsSchema } from '@/types/mapping.js';
import type { SourceSystem } from '@/types/sources.js';

const m = campaignIdentityMapping;

/**
 * Source of truth for canonical campaign identities. Reads adapt to whichever
 * optional columns the database has; writes that need a missing column add it
 * first.
 */
export class IdentityMappingRegistry {
    constructor(private readonly ctx: AppContext) {}

    private get log() {
        return this.ctx.logger.child({ component: 'identity-mapping' });
    }

    // Optional columns fall back to constants so the select never names a column that is not there
    private selection() {
        const caps = this.ctx.capabilities;
        return {
            id: m.id,
            sourceSystem: m.sourceSystem,
            externalCampaignId: m.externalCampaignId,
            originalCampaignName: m.originalCampaignName,
            displayName: m.displayName,
            category: m.category,
            campaignType: m.campaignType,
            network: caps.hasMappingColumn('network') ? sql<string | null>`${m.network}` : sql<string | null>`null`,
            displayNetworkLabel: caps.hasMappingColumn('display_network_label') ? sql<string | null>`${m.displayNetworkLabel}` : sql<string | null>`null`,
            displaySourceLabel: caps.hasMappingColumn('display_source_label') ? sql<string | null>`${m.displaySourceLabel}` : sql<string | null>`null`,
            displayOrder: caps.hasMappingColumn('display_order') ? sql<number>`${m.displayOrder}`.mapWith(Number) : sql<number>`0`.mapWith(Number),
            isActive: m.isActive,
            createdAt: m.createdAt,
            updatedAt: m.updatedAt,
        };
    }

    private requireMappingTable() {
        if (!this.ctx.capabilities.hasMappingTable()) {
            throw new StoreUnavailableError(`${MAPPING_TABLE} does not exist; schema evolution has not completed`);
        }
    }

    /**
     * Add missing optional columns and refresh the snapshot. Safe to run from
     * several instances at once.
     */
    async ensureMappingColumns(columns: OptionalMappingColumn[]): Promise<void> {
        this.requireMappingTable();
        const missing = columns.filter(column => !this.ctx.capabilities.hasMappingColumn(column));
        if (missing.length === 0) {
            return;
        }

        for (const column of missing) {
            const added = await this.ctx.run(`add ${MAPPING_TABLE}.${column}`, db => addColumnIfMissing(db, MAPPING_TABLE, column, MAPPING_COLUMN_DEFINITIONS[column]));
            if (added) {
                this.log.info({ column }, 'Added missing mapping column');
            }
        }

        await this.ctx.capabilities.refresh();
    }

    /**
     * Insert or update the mapping for (sourceSystem, externalCampaignId). Updates
     * every display field and reactivates a soft-deleted row. displayOrder only
     * changes when supplied; originalCampaignName only when non-empty.
     */
    async upsert(input: MappingInput): Promise<IdentityMapping> {
        const values = mappingInputSchema.parse(input);
        await this.ensureMappingColumns(this.ctx.capabilities.missingMappingColumns());

        const now = this.ctx.now();
        const display = {
            displayName: values.displayName,
            category: values.category ?? null,
            campaignType: values.campaignType ?? null,
            network: values.network ?? null,
            displayNetworkLabel: values.displayNetworkLabel ?? null,
            displaySourceLabel: values.displaySourceLabel ?? null,
        };

        const [row] = await this.ctx.run('upsert mapping', db =>
            db
                .insert(m)
                .values({
                    sourceSystem: values.sourceSystem,
                    externalCampaignId: values.externalCampaignId,
                    originalCampaignName: values.originalCampaignName ?? '',
                    ...display,
                    displayOrder: values.displayOrder ?? 0,
                    isActive: true,
                    createdAt: now,
                    updatedAt: now,
                })
                .onConflictDoUpdate({
                    target: [m.sourceSystem, m.externalCampaignId],
                    set: {
                        ...display,
                        ...(values.originalCampaignName ? { originalCampaignName: values.originalCampaignName } : {}),
                        ...(values.displayOrder !== undefined ? { displayOrder: values.displayOrder } : {}),
                        isActive: true,
                        updatedAt: now,
                    },
                })
                .returning(this.selection())
        );

        if (!row) {
            throw new Error(`Upsert returned no row for ${values.sourceSystem}/${values.externalCampaignId}`);
        }

        this.log.debug({ id: row.id, sourceSystem: row.sourceSystem, externalCampaignId: row.externalCampaignId }, 'Mapping upserted');
        return row;
    }

    async get(id: number): Promise<IdentityMapping> {
        this.requireMappingTable();
        const [row] = await this.ctx.run('get mapping', db => db.select(this.selection()).from(m).where(eq(m.id, id)).limit(1));
        if (!row) {
            throw new NotFoundError('Mapping', id);
        }
        return row;
    }

    /**
     * Hide a mapping. Idempotent on an already inactive row.
     */
    async softDelete(id: number): Promise<void> {
        this.requireMappingTable();
        const now = this.ctx.now();

        const updated = await this.ctx.run('soft delete mapping', db =>
            db
                .update(m)
                .set({ isActive: false, updatedAt: now })
                .where(and(eq(m.id, id), eq(m.isActive, true)))
                .returning({ id: m.id })
        );
        if (updated.length > 0) {
            this.log.debug({ id }, 'Mapping soft-deleted');
            return;
        }

        const existing = await this.ctx.run('find mapping', db => db.select({ id: m.id }).from(m).where(eq(m.id, id)).limit(1));
        if (existing.length === 0) {
            throw new NotFoundError('Mapping', id);
        }
    }

    /**
     * Active mappings ordered by source, display order, then display name.
     */
    async list(sourceSystem?: SourceSystem): Promise<IdentityMapping[]> {
        if (!this.ctx.capabilities.hasMappingTable()) {
            this.log.warn(`${MAPPING_TABLE} does not exist; returning no mappings`);
            return [];
        }

        const filter = sourceSystem ? and(eq(m.isActive, true), eq(m.sourceSystem, sourceSystem)) : eq(m.isActive, true);
        const ordering = this.ctx.capabilities.hasMappingColumn('display_order')
            ? [asc(m.sourceSystem), asc(m.displayOrder), asc(m.displayName), asc(m.id)]
            : [asc(m.sourceSystem), asc(m.displayName), asc(m.id)];

        return this.ctx.run('list mappings', db =>
            db
                .select(this.selection())
                .from(m)
                .where(filter)
                .orderBy(...ordering)
        );
    }

    /**
     * Assign display orders in one transaction. Any unknown id rolls back the
     * whole batch.
     */
    async reorder(items: ReorderItem[]): Promise<void> {
        const parsed = reorderItemsSchema.parse(items);
        if (parsed.length === 0) {
            return;
        }

        await this.ensureMappingColumns(['display_order']);
        const now = this.ctx.now();

        await this.ctx.run('reorder mappings', db =>
            db.transaction(async tx => {
                for (const item of parsed) {
                    const updated = await tx.update(m).set({ displayOrder: item.displayOrder, updatedAt: now }).where(eq(m.id, item.id)).returning({ id: m.id });
                    if (updated.length === 0) {
                        throw new NotFoundError('Mapping', item.id);
                    }
                }
            })
        );

        this.log.debug({ count: parsed.length }, 'Mappings reordered');
    }

    /**
     * Active mappings keyed by (sourceSystem, externalCampaignId). Loaded once per
     * unification or resolution pass.
     */
    async activeIndex(sourceSystem?: SourceSystem): Promise<Map<string, IdentityMapping>> {
        const mappings = await this.list(sourceSystem);
        return new Map(mappings.map(mapping => [mappingKey(mapping.sourceSystem, mapping.externalCampaignId), mapping]));
    }
}
