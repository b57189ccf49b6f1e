import { and, eq, sql } from 'drizzle-orm';
import { informationSchemaColumns } from '@/db/catalog.js';
import type { Database } from '@/db/index.js';
import type { OptionalMappingColumn } from '@/lib/schema-capabilities/index.js';

/** Column definitions for mapping columns added after the initial table. */
export const MAPPING_COLUMN_DEFINITIONS: Record<OptionalMappingColumn, string> = {
    network: 'text',
    display_order: 'integer NOT NULL DEFAULT 0',
    display_network_label: 'text',
    display_source_label: 'text',
};

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

export function quoteIdentifier(name: string): string {
    if (!IDENTIFIER.test(name)) {
        throw new Error(`Refusing to quote unexpected identifier: ${name}`);
    }
    return `"${name}"`;
}

export async function columnExists(db: Database, table: string, column: string): Promise<boolean> {
    const rows = await db
        .select({ columnName: informationSchemaColumns.columnName })
        .from(informationSchemaColumns)
        .where(
            and(
                eq(informationSchemaColumns.tableSchema, sql`current_schema()`),
                eq(informationSchemaColumns.tableName, table),
                eq(informationSchemaColumns.columnName, column)
            )
        )
        .limit(1);
    return rows.length > 0;
}

/**
 * Probe first, then ADD COLUMN IF NOT EXISTS. Returns whether this call added it.
 */
export async function addColumnIfMissing(db: Database, table: string, column: string, definition: string): Promise<boolean> {
    if (await columnExists(db, table, column)) {
        return false;
    }

    await db.execute(sql.raw(`ALTER TABLE ${quoteIdentifier(table)} ADD COLUMN IF NOT EXISTS ${quoteIdentifier(column)} ${definition}`));
    return true;
}
