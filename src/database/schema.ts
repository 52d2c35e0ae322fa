/**
 * Table definitions. Every statement is idempotent so the whole script can
 * run on each start against a fresh or an existing file.
 */

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS channels (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    url TEXT UNIQUE NOT NULL,
    post_times TEXT,
    forbidden_words TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS sources (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    channel_id INTEGER NOT NULL,
    source_url TEXT NOT NULL,
    parse_media INTEGER NOT NULL,
    forbidden_words TEXT,
    FOREIGN KEY (channel_id) REFERENCES channels(id) ON DELETE CASCADE
  )`,
  `CREATE TABLE IF NOT EXISTS sites (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    parent_id INTEGER NOT NULL,
    site_url TEXT NOT NULL,
    site_type TEXT CHECK (site_type IN ('AUTO', 'RENT', 'BUY', 'FREE')) NOT NULL,
    FOREIGN KEY (parent_id) REFERENCES sources(id) ON DELETE CASCADE
  )`,
  // Child lookups by parent
  'CREATE INDEX IF NOT EXISTS idx_sources_channel_id ON sources (channel_id)',
  'CREATE INDEX IF NOT EXISTS idx_sites_parent_id ON sites (parent_id)',
];
