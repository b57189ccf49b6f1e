import { bigint, boolean, date, index, integer, numeric, pgTable, serial, text, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';
import type { SourceSystem } from '@/types/sources.js';

/**
 * ----------------------------------------------------------------------------
 * Campaign Identity Mapping
 * ----------------------------------------------------------------------------
 * Canonical (source_system, external_campaign_id) -> display identity.
 * Rows are never hard-deleted; is_active = false hides a mapping and lets its
 * facts surface as unmapped again.
 *
 * network, display_order and the display_* label columns arrived through later
 * migrations. Older databases may still lack them, so reads go through the
 * schema capability snapshot before touching them.
 */
export const campaignIdentityMapping = pgTable(
    'campaign_identity_mapping',
    {
        id: serial('id').primaryKey(),
        sourceSystem: text('source_system').$type<SourceSystem>().notNull(),
        externalCampaignId: text('external_campaign_id').notNull(), // case-sensitive, opaque per source
        originalCampaignName: text('original_campaign_name').notNull().default(''), // as last seen in the source
        displayName: text('display_name').notNull(),
        category: text('category'),
        campaignType: text('campaign_type'),
        network: text('network'),
        displayNetworkLabel: text('display_network_label'),
        displaySourceLabel: text('display_source_label'),
        displayOrder: integer('display_order').notNull().default(0), // UI sort stability only
        isActive: boolean('is_active').notNull().default(true),
        createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
        updatedAt: timestamp('updated_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
    },
    table => [
        uniqueIndex('campaign_identity_mapping_source_external_idx').on(table.sourceSystem, table.externalCampaignId),
        index('campaign_identity_mapping_source_idx').on(table.sourceSystem),
    ]
);

/**
 * ----------------------------------------------------------------------------
 * Schema Migration Ledger
 * ----------------------------------------------------------------------------
 * Append-only. One row per migration name ever applied.
 */
export const schemaMigrations = pgTable('schema_migrations', {
    id: serial('id').primaryKey(),
    name: text('name').notNull().unique(),
    appliedAt: timestamp('applied_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
});

/**
 * =====================================================================================
 * Fact Tables
 * =====================================================================================
 *
 * One table per source system, written by that source's ingestion job and
 * replaced wholesale on re-import. This service only reads them.
 *
 * campaign_id is the source's numeric campaign id. Mappings store it as text, so
 * joins compare campaign_id::text with external_campaign_id.
 *
 * Any of these tables may be missing on a fresh database until its ingestion job
 * has run at least once.
 */

// Both paid-search platforms export the same report shape.
const paidSearchFactTable = (name: string) =>
    pgTable(
        name,
        {
            id: serial('id').primaryKey(),
            date: date('date', { mode: 'string' }).notNull(),
            campaignId: bigint('campaign_id', { mode: 'number' }).notNull(),
            campaignName: text('campaign_name').notNull(),
            accountId: text('account_id'),
            network: text('network'), // Search, Display, Audience, ...
            impressions: bigint('impressions', { mode: 'number' }).notNull().default(0),
            clicks: bigint('clicks', { mode: 'number' }).notNull().default(0),
            cost: numeric('cost', { precision: 12, scale: 2 }).notNull().default('0'),
            conversions: numeric('conversions', { precision: 10, scale: 2 }).notNull().default('0'),
            updatedAt: timestamp('updated_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
        },
        table => [index(`${name}_date_campaign_idx`).on(table.date, table.campaignId)]
    );

export type PaidSearchFactTable = ReturnType<typeof paidSearchFactTable>;

export const factGoogleAds = paidSearchFactTable('fact_google_ads');

export const factBingAds = paidSearchFactTable('fact_bing_ads');

/**
 * Affiliate tracker. No impressions concept.
 */
export const factRedtrack = pgTable(
    'fact_redtrack',
    {
        id: serial('id').primaryKey(),
        date: date('date', { mode: 'string' }).notNull(),
        campaignId: bigint('campaign_id', { mode: 'number' }).notNull(),
        campaignName: text('campaign_name').notNull(),
        trackerId: text('tracker_id'),
        clicks: bigint('clicks', { mode: 'number' }).notNull().default(0),
        conversions: bigint('conversions', { mode: 'number' }).notNull().default(0),
        cost: numeric('cost', { precision: 12, scale: 2 }).notNull().default('0'),
        revenue: numeric('revenue', { precision: 12, scale: 2 }).notNull().default('0'),
        updatedAt: timestamp('updated_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
    },
    table => [index('fact_redtrack_date_campaign_idx').on(table.date, table.campaignId)]
);

/**
 * Web analytics. Visits that arrived without campaign parameters have a null
 * campaign_id and carry no identity.
 */
export const factMatomo = pgTable(
    'fact_matomo',
    {
        id: serial('id').primaryKey(),
        date: date('date', { mode: 'string' }).notNull(),
        campaignId: bigint('campaign_id', { mode: 'number' }),
        campaignName: text('campaign_name'),
        siteId: integer('site_id'),
        visits: bigint('visits', { mode: 'number' }).notNull().default(0),
        uniqueVisitors: bigint('unique_visitors', { mode: 'number' }).notNull().default(0),
        pageViews: bigint('page_views', { mode: 'number' }).notNull().default(0),
        goalConversions: bigint('goal_conversions', { mode: 'number' }).notNull().default(0),
        updatedAt: timestamp('updated_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
    },
    table => [index('fact_matomo_date_campaign_idx').on(table.date, table.campaignId)]
);
