/**
 * Migration 002 - Review metrics read model
 *
 * Review ingestion writes one row per review; alert evaluation only reads
 * rating, sentiment and creation time.
 */

export const MIGRATION_002_UP = `
  CREATE TABLE IF NOT EXISTS reviews (
    id TEXT PRIMARY KEY,
    platform TEXT,
    rating REAL,
    sentiment TEXT,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_reviews_created ON reviews(created_at);
`;
