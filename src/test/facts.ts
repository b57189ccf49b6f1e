import type { Database } from '@/db/index.js';
import { factBingAds, factGoogleAds, factMatomo, factRedtrack } from '@/db/schema.js';

type PaidSearchFact = typeof factGoogleAds.$inferInsert;
type RedtrackFact = typeof factRedtrack.$inferInsert;
type MatomoFact = typeof factMatomo.$inferInsert;

/**
 * Seed rows the way each ingestion job would write them.
 */
export const seedFacts = {
    googleAds: (db: Database, rows: PaidSearchFact[]) => db.insert(factGoogleAds).values(rows),
    bingAds: (db: Database, rows: PaidSearchFact[]) => db.insert(factBingAds).values(rows),
    redtrack: (db: Database, rows: RedtrackFact[]) => db.insert(factRedtrack).values(rows),
    matomo: (db: Database, rows: MatomoFact[]) => db.insert(factMatomo).values(rows),
};
