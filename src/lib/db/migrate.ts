import type { Database } from 'sql.js';

export const SCHEMA_VERSION = 1;

// Mirrors ./schema.ts
const STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS images (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    digest TEXT NOT NULL,
    registry TEXT NOT NULL,
    repository TEXT NOT NULL,
    tag TEXT NOT NULL,
    size_bytes INTEGER,
    created_at TEXT,
    scanned_at TEXT NOT NULL,
    comprehensive INTEGER NOT NULL DEFAULT 0,
    os_name TEXT,
    os_version TEXT,
    critical_count INTEGER NOT NULL DEFAULT 0,
    high_count INTEGER NOT NULL DEFAULT 0,
    medium_count INTEGER NOT NULL DEFAULT 0,
    low_count INTEGER NOT NULL DEFAULT 0,
    unknown_count INTEGER NOT NULL DEFAULT 0,
    total_count INTEGER NOT NULL DEFAULT 0,
    sources TEXT NOT NULL DEFAULT '[]'
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS images_digest_idx ON images (digest)`,
  `CREATE TABLE IF NOT EXISTS image_tags (
    registry TEXT NOT NULL,
    repository TEXT NOT NULL,
    tag TEXT NOT NULL,
    image_id INTEGER NOT NULL REFERENCES images(id) ON DELETE CASCADE,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (registry, repository, tag)
  )`,
  `CREATE INDEX IF NOT EXISTS image_tags_image_idx ON image_tags (image_id)`,
  `CREATE TABLE IF NOT EXISTS packages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    image_id INTEGER NOT NULL REFERENCES images(id) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    name TEXT NOT NULL,
    version TEXT NOT NULL,
    ecosystem TEXT NOT NULL,
    purl TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS packages_image_idx ON packages (image_id)`,
  `CREATE INDEX IF NOT EXISTS packages_name_idx ON packages (name)`,
  `CREATE TABLE IF NOT EXISTS advisories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    advisory_id TEXT NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS advisories_advisory_id_idx ON advisories (advisory_id)`,
  `CREATE TABLE IF NOT EXISTS image_vulnerabilities (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    image_id INTEGER NOT NULL REFERENCES images(id) ON DELETE CASCADE,
    advisory_ref INTEGER NOT NULL REFERENCES advisories(id),
    position INTEGER NOT NULL,
    severity TEXT NOT NULL,
    package_name TEXT NOT NULL,
    package_version TEXT NOT NULL,
    package_ecosystem TEXT NOT NULL,
    source_tools TEXT NOT NULL,
    fixed_version TEXT
  )`,
  `CREATE INDEX IF NOT EXISTS image_vulnerabilities_image_idx ON image_vulnerabilities (image_id)`,
  `CREATE TABLE IF NOT EXISTS languages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    image_id INTEGER NOT NULL REFERENCES images(id) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    language TEXT NOT NULL,
    version TEXT NOT NULL,
    major_minor TEXT,
    package_name TEXT NOT NULL,
    source TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS languages_image_idx ON languages (image_id)`,
  `CREATE INDEX IF NOT EXISTS languages_language_idx ON languages (language)`,
];

/**
 * Create any missing tables. Safe to run against an up-to-date database.
 */
export function migrate(sqlite: Database): void {
  sqlite.run('PRAGMA foreign_keys = ON');
  sqlite.run('BEGIN');
  try {
    for (const statement of STATEMENTS) {
      sqlite.run(statement);
    }
    sqlite.run(`PRAGMA user_version = ${SCHEMA_VERSION}`);
    sqlite.run('COMMIT');
  } catch (error) {
    sqlite.run('ROLLBACK');
    throw error;
  }
}
