import { pgSchema, text } from 'drizzle-orm/pg-core';

/**
 * Typed views over the parts of information_schema the capability probe and the
 * migration runner read. Kept out of schema.ts so they never reach the app schema.
 */
const informationSchema = pgSchema('information_schema');

export const informationSchemaTables = informationSchema.table('tables', {
    tableSchema: text('table_schema').notNull(),
    tableName: text('table_name').notNull(),
});

export const informationSchemaColumns = informationSchema.table('columns', {
    tableSchema: text('table_schema').notNull(),
    tableName: text('table_name').notNull(),
    columnName: text('column_name').notNull(),
});
