import { listSources } from '@/config/sources.js';
import { MAPPING_TABLE } from '@/lib/schema-capabilities/index.js';
import { MAPPING_COLUMN_DEFINITIONS } from './columns.js';
import type { Migration } from './types.js';

const createMappingTable = `
CREATE TABLE IF NOT EXISTS ${MAPPING_TABLE} (
    id serial PRIMARY KEY,
    source_system text NOT NULL,
    external_campaign_id text NOT NULL,
    original_campaign_name text NOT NULL DEFAULT '',
    display_name text NOT NULL,
    category text,
    campaign_type text,
    is_active boolean NOT NULL DEFAULT true,
    created_at timestamptz NOT NULL DEFAULT now(),
    updated_at timestamptz NOT NULL DEFAULT now()
)`;

// Latest non-null network per campaign from each paid-search fact table, only
// where the mapping has none yet. Fact tables that do not exist are skipped.
const backfillNetwork = () => {
    const blocks = listSources()
        .filter(source => source.reportsNetwork)
        .map(
            source => `
    IF to_regclass('${source.factTable}') IS NOT NULL THEN
        UPDATE ${MAPPING_TABLE} AS m
        SET network = f.network
        FROM (
            SELECT DISTINCT ON (campaign_id) campaign_id::text AS external_campaign_id, network
            FROM ${source.factTable}
            WHERE network IS NOT NULL
            ORDER BY campaign_id, date DESC
        ) AS f
        WHERE m.source_system = '${source.sourceSystem}'
            AND m.external_campaign_id = f.external_campaign_id
            AND m.network IS NULL;
    END IF;`
        )
        .join('\n');

    return `DO $$\nBEGIN${blocks}\nEND $$`;
};

/**
 * Every schema change this service owns, in application order. Fact tables are
 * created by ingestion and never appear here.
 */
export const MIGRATIONS: Migration[] = [
    {
        name: '0001_create_campaign_identity_mapping',
        description: 'Create the identity mapping table and its indexes',
        steps: [
            { kind: 'sql', description: 'create table', statement: createMappingTable },
            {
                kind: 'sql',
                description: 'unique identity index',
                statement: `CREATE UNIQUE INDEX IF NOT EXISTS campaign_identity_mapping_source_external_idx ON ${MAPPING_TABLE} (source_system, external_campaign_id)`,
            },
            {
                kind: 'sql',
                description: 'source index',
                statement: `CREATE INDEX IF NOT EXISTS campaign_identity_mapping_source_idx ON ${MAPPING_TABLE} (source_system)`,
            },
        ],
    },
    {
        name: '0002_add_mapping_network',
        description: 'Add the network column to mappings',
        dependsOn: ['0001_create_campaign_identity_mapping'],
        steps: [{ kind: 'addColumn', table: MAPPING_TABLE, column: 'network', definition: MAPPING_COLUMN_DEFINITIONS.network }],
    },
    {
        name: '0003_add_mapping_display_order',
        description: 'Add display_order for stable UI sorting',
        dependsOn: ['0001_create_campaign_identity_mapping'],
        steps: [{ kind: 'addColumn', table: MAPPING_TABLE, column: 'display_order', definition: MAPPING_COLUMN_DEFINITIONS.display_order }],
    },
    {
        name: '0004_add_mapping_display_labels',
        description: 'Add display overrides for network and source labels',
        dependsOn: ['0001_create_campaign_identity_mapping'],
        steps: [
            { kind: 'addColumn', table: MAPPING_TABLE, column: 'display_network_label', definition: MAPPING_COLUMN_DEFINITIONS.display_network_label },
            { kind: 'addColumn', table: MAPPING_TABLE, column: 'display_source_label', definition: MAPPING_COLUMN_DEFINITIONS.display_source_label },
        ],
    },
    {
        name: '0005_backfill_mapping_network',
        description: 'Fill missing mapping networks from paid-search facts',
        dependsOn: ['0002_add_mapping_network'],
        steps: [{ kind: 'sql', description: 'backfill network', statement: backfillNetwork() }],
    },
];
