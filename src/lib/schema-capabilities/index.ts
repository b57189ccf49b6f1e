import { and, eq, getTableName, inArray, sql } from 'drizzle-orm';
import { listSources } from '@/config/sources.js';
import { informationSchemaColumns, informationSchemaTables } from '@/db/catalog.js';
import type { Database } from '@/db/index.js';
import { campaignIdentityMapping } from '@/db/schema.js';
import type { SourceSystem } from '@/types/sources.js';

/**
 * Mapping columns that arrived after the table was first created. Everything
 * else on the mapping table exists from the first migration on.
 */
export const OPTIONAL_MAPPING_COLUMNS = ['network', 'display_order', 'display_network_label', 'display_source_label'] as const;
export type OptionalMappingColumn = (typeof OPTIONAL_MAPPING_COLUMNS)[number];

export const MAPPING_TABLE = getTableName(campaignIdentityMapping);

/** Missing fact tables are re-probed at most this often. */
const MISSING_FACT_TABLE_REPROBE_MS = 60_000;

export interface SchemaCapabilities {
    /** Increments on every refresh */
    version: number;
    probedAt: Date;
    mappingTable: boolean;
    mappingColumns: ReadonlySet<OptionalMappingColumn>;
    factTables: ReadonlySet<SourceSystem>;
}

export type ProbeRunner = <T>(label: string, operation: () => Promise<T>) => Promise<T>;

const isOptionalMappingColumn = (column: string): column is OptionalMappingColumn => OPTIONAL_MAPPING_COLUMNS.some(optional => optional === column);

/**
 * Read which optional schema objects exist right now.
 */
export async function probeSchemaCapabilities(db: Database, version: number, probedAt: Date): Promise<SchemaCapabilities> {
    const sources = listSources();
    const tableNames = [MAPPING_TABLE, ...sources.map(source => source.factTable)];

    const tables = await db
        .select({ tableName: informationSchemaTables.tableName })
        .from(informationSchemaTables)
        .where(and(eq(informationSchemaTables.tableSchema, sql`current_schema()`), inArray(informationSchemaTables.tableName, tableNames)));

    const present = new Set(tables.map(table => table.tableName));

    const columns = present.has(MAPPING_TABLE)
        ? await db
              .select({ columnName: informationSchemaColumns.columnName })
              .from(informationSchemaColumns)
              .where(and(eq(informationSchemaColumns.tableSchema, sql`current_schema()`), eq(informationSchemaColumns.tableName, MAPPING_TABLE)))
        : [];

    return {
        version,
        probedAt,
        mappingTable: present.has(MAPPING_TABLE),
        mappingColumns: new Set(columns.map(column => column.columnName).filter(isOptionalMappingColumn)),
        factTables: new Set(sources.filter(source => present.has(source.factTable)).map(source => source.sourceSystem)),
    };
}

/**
 * Application-lifetime snapshot of the schema. Refreshed at startup and after
 * every schema evolution run; request paths read flags from it instead of
 * querying the catalog.
 */
export class SchemaCapabilityStore {
    private current: SchemaCapabilities;
    private inflight: Promise<SchemaCapabilities> | null = null;

    constructor(
        private readonly db: Database,
        private readonly runProbe: ProbeRunner,
        private readonly now: () => Date
    ) {
        this.current = {
            version: 0,
            probedAt: new Date(0),
            mappingTable: false,
            mappingColumns: new Set(),
            factTables: new Set(),
        };
    }

    get snapshot(): SchemaCapabilities {
        return this.current;
    }

    /** Concurrent callers share one in-flight probe. */
    refresh(): Promise<SchemaCapabilities> {
        if (!this.inflight) {
            this.inflight = this.reprobe().finally(() => {
                this.inflight = null;
            });
        }
        return this.inflight;
    }

    private async reprobe(): Promise<SchemaCapabilities> {
        const next = await this.runProbe('schema capability probe', () => probeSchemaCapabilities(this.db, this.current.version + 1, this.now()));
        this.current = next;
        return next;
    }

    hasMappingTable(): boolean {
        return this.current.mappingTable;
    }

    hasMappingColumn(column: OptionalMappingColumn): boolean {
        return this.current.mappingColumns.has(column);
    }

    missingMappingColumns(): OptionalMappingColumn[] {
        return OPTIONAL_MAPPING_COLUMNS.filter(column => !this.current.mappingColumns.has(column));
    }

    /**
     * Fact tables are created by ingestion jobs that run on their own schedule,
     * so a table missing at startup can appear later. A stale "missing" answer
     * triggers one re-probe.
     */
    async hasFactTable(sourceSystem: SourceSystem): Promise<boolean> {
        if (this.current.factTables.has(sourceSystem)) {
            return true;
        }

        const age = this.now().getTime() - this.current.probedAt.getTime();
        if (age < MISSING_FACT_TABLE_REPROBE_MS) {
            return false;
        }

        const refreshed = await this.refresh();
        return refreshed.factTables.has(sourceSystem);
    }
}
