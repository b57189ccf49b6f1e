import { sql } from 'drizzle-orm';
import { afterEach, describe, expect, it } from 'vitest';
import { schemaMigrations } from '@/db/schema';
import { createTestPipeline, type TestPipeline } from '@/test/database';
import { MIGRATIONS, runSchemaEvolution } from './index';
import type { Migration } from './types';

const ALL_NAMES = MIGRATIONS.map(migration => migration.name);

const ledgerNames = async (harness: TestPipeline) => {
    const rows = await harness.db.select({ name: schemaMigrations.name }).from(schemaMigrations).orderBy(schemaMigrations.name);
    return rows.map(row => row.name);
};

describe('runSchemaEvolution', () => {
    let harness: TestPipeline | undefined;

    afterEach(async () => {
        await harness?.close();
        harness = undefined;
    });

    it('applies every migration on a fresh database and records each once', async () => {
        harness = await createTestPipeline({ evolve: false, factTables: [] });

        const result = await runSchemaEvolution(harness.ctx);

        expect(result).toEqual({ applied: ALL_NAMES, failed: [] });
        expect(await ledgerNames(harness)).toEqual(ALL_NAMES);
    });

    it('refreshes the capability snapshot after the run', async () => {
        harness = await createTestPipeline({ evolve: false, factTables: [] });
        const before = harness.ctx.capabilities.snapshot;
        expect(before.mappingTable).toBe(false);

        await runSchemaEvolution(harness.ctx);

        const after = harness.ctx.capabilities.snapshot;
        expect(after.version).toBe(before.version + 1);
        expect(after.mappingTable).toBe(true);
        expect([...after.mappingColumns].sort()).toEqual(['display_network_label', 'display_order', 'display_source_label', 'network']);
    });

    it('is a no-op the second time', async () => {
        harness = await createTestPipeline({ factTables: [] });

        const second = await runSchemaEvolution(harness.ctx);

        expect(second).toEqual({ applied: [], failed: [] });
        expect(await ledgerNames(harness)).toEqual(ALL_NAMES);
    });

    it('applies each migration exactly once when two runs race', async () => {
        harness = await createTestPipeline({ evolve: false, factTables: [] });
        const ctx = harness.ctx;

        const [first, second] = await Promise.all([runSchemaEvolution(ctx), runSchemaEvolution(ctx)]);

        expect([...first.applied, ...second.applied].sort()).toEqual(ALL_NAMES);
        expect([...first.failed, ...second.failed]).toEqual([]);
        expect(await ledgerNames(harness)).toEqual(ALL_NAMES);
    });

    it('continues past a failing migration and blocks only its dependents', async () => {
        harness = await createTestPipeline({ evolve: false, factTables: [] });
        const extra: Migration[] = [
            {
                name: '0006_broken',
                description: 'references a table that does not exist',
                steps: [{ kind: 'sql', description: 'alter missing', statement: 'ALTER TABLE no_such_table ADD COLUMN x integer' }],
            },
            {
                name: '0007_needs_broken',
                description: 'depends on the broken one',
                dependsOn: ['0006_broken'],
                steps: [{ kind: 'sql', description: 'noop', statement: 'SELECT 1' }],
            },
            {
                name: '0008_independent',
                description: 'unrelated',
                steps: [{ kind: 'sql', description: 'create probe', statement: 'CREATE TABLE IF NOT EXISTS evolution_probe (id integer)' }],
            },
        ];

        const result = await runSchemaEvolution(harness.ctx, [...extra, ...MIGRATIONS]);

        expect(result.applied).toEqual([...ALL_NAMES, '0008_independent']);
        expect(result.failed).toEqual(['0006_broken', '0007_needs_broken']);
        expect(await ledgerNames(harness)).toEqual([...ALL_NAMES, '0008_independent']);
        expect(harness.logger.records.some(record => record.level === 'error' && String(record.args[1]).startsWith('Migration 0006_broken failed'))).toBe(true);
    });

    it('treats an object that already exists as applied', async () => {
        harness = await createTestPipeline({ factTables: [] });
        await harness.db.execute(sql.raw('CREATE TABLE evolution_race (id integer)'));

        const result = await runSchemaEvolution(harness.ctx, [
            ...MIGRATIONS,
            {
                name: '0009_create_race_table',
                description: 'non-idempotent create',
                steps: [
                    { kind: 'sql', description: 'create', statement: 'CREATE TABLE evolution_race (id integer)' },
                    { kind: 'sql', description: 'index', statement: 'CREATE INDEX IF NOT EXISTS evolution_race_id_idx ON evolution_race (id)' },
                ],
            },
        ]);

        expect(result).toEqual({ applied: ['0009_create_race_table'], failed: [] });
        expect(harness.logger.records).toContainEqual({ level: 'info', args: [{ code: 'CONFLICT_RACE' }, 'Lost race while running create'] });
    });

    it('backfills mapping networks from paid-search facts without overwriting existing values', async () => {
        harness = await createTestPipeline({ evolve: false, factTables: ['Google Ads'] });
        const upTo = (last: string) => MIGRATIONS.filter(migration => migration.name <= last);

        await runSchemaEvolution(harness.ctx, upTo('0004_add_mapping_display_labels'));
        await harness.db.execute(
            sql.raw(`INSERT INTO campaign_identity_mapping (source_system, external_campaign_id, display_name, network) VALUES
                ('Google Ads', '11', 'Eleven', NULL),
                ('Google Ads', '12', 'Twelve', 'Display')`)
        );
        await harness.db.execute(
            sql.raw(`INSERT INTO fact_google_ads (date, campaign_id, campaign_name, network) VALUES
                ('2025-03-01', 11, 'eleven', 'Search'),
                ('2025-03-02', 11, 'eleven', 'Audience'),
                ('2025-03-02', 12, 'twelve', 'Search')`)
        );

        const result = await runSchemaEvolution(harness.ctx);
        const mappings = await harness.pipeline.listMappings('Google Ads');

        expect(result).toEqual({ applied: ['0005_backfill_mapping_network'], failed: [] });
        expect(mappings.map(mapping => [mapping.externalCampaignId, mapping.network])).toEqual([
            ['11', 'Audience'],
            ['12', 'Display'],
        ]);
    });
});
