/**
 * Database schema for the postgres listing store
 */
export const SCHEMA_SQL = `
-- Internship Listings Table
-- One row per accepted listing; identity_key enforces store-level uniqueness
-- and position keeps insertion order
CREATE TABLE IF NOT EXISTS internship_listings (
  position BIGSERIAL NOT NULL,
  identity_key TEXT PRIMARY KEY,
  company TEXT NOT NULL,
  role TEXT NOT NULL,
  location TEXT NOT NULL,
  link TEXT NOT NULL,
  source VARCHAR(32) NOT NULL,
  date_found TIMESTAMP WITH TIME ZONE NOT NULL,
  created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_internship_listings_position ON internship_listings(position);
CREATE INDEX IF NOT EXISTS idx_internship_listings_source ON internship_listings(source);
`;
