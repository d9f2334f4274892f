import { createHash } from 'crypto';
import type Database from 'better-sqlite3';
import { SchemaError } from '../core/errors.js';

export interface MigrationDefinition { version: number; name: string; key: string; }
export interface AppliedMigration { version: number; name: string; checksum: string; }
export interface MigrationReport {
  fromVersion: number;
  toVersion: number;
  applied: AppliedMigration[];
}

const INLINE_MIGRATIONS: Record<string, string> = {
  '001_framework': [
    'CREATE TABLE IF NOT EXISTS world_model_metadata (key TEXT PRIMARY KEY, value TEXT NOT NULL);',
    "CREATE TABLE IF NOT EXISTS framework_entity (kind TEXT NOT NULL CHECK (kind IN ('pillar', 'core_value', 'sub_value')), id TEXT NOT NULL, label TEXT NOT NULL, parent_id TEXT, PRIMARY KEY (kind, id));",
  ].join('\n'),
  '002_mechanism_graph': [
    "CREATE TABLE IF NOT EXISTS mechanism_node (id TEXT PRIMARY KEY, ref_kind TEXT NOT NULL CHECK (ref_kind IN ('pillar', 'core_value', 'sub_value', 'mechanism', 'outcome')), ref_id TEXT NOT NULL, label TEXT NOT NULL CHECK (length(trim(label)) > 0), source_id TEXT, UNIQUE (ref_kind, ref_id));",
    "CREATE TABLE IF NOT EXISTS mechanism_edge (id TEXT PRIMARY KEY, from_node TEXT NOT NULL REFERENCES mechanism_node(id) ON DELETE CASCADE, to_node TEXT NOT NULL REFERENCES mechanism_node(id) ON DELETE CASCADE, relation_type TEXT NOT NULL CHECK (relation_type IN ('ENABLES', 'REINFORCES', 'COMPLEMENTS', 'CONDITIONAL_ON', 'INHIBITS', 'TENSION_WITH', 'RESOLVES_WITH')), polarity INTEGER NOT NULL CHECK (polarity IN (-1, 1)), polarity_overridden INTEGER NOT NULL DEFAULT 0, confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1));",
    'CREATE INDEX IF NOT EXISTS idx_mechanism_edge_from ON mechanism_edge(from_node);',
    'CREATE INDEX IF NOT EXISTS idx_mechanism_edge_to ON mechanism_edge(to_node);',
    "CREATE TABLE IF NOT EXISTS mechanism_edge_span (id INTEGER PRIMARY KEY AUTOINCREMENT, edge_id TEXT NOT NULL REFERENCES mechanism_edge(id) ON DELETE CASCADE, chunk_id TEXT NOT NULL, span_start INTEGER NOT NULL, span_end INTEGER NOT NULL, quote TEXT NOT NULL CHECK (length(trim(quote)) > 0), CHECK (span_end >= span_start), UNIQUE (edge_id, chunk_id, span_start, span_end));",
    'CREATE INDEX IF NOT EXISTS idx_mechanism_edge_span_edge ON mechanism_edge_span(edge_id);',
  ].join('\n'),
  '003_feedback_loops': [
    "CREATE TABLE IF NOT EXISTS feedback_loop (loop_id TEXT PRIMARY KEY, loop_type TEXT NOT NULL CHECK (loop_type IN ('reinforcing', 'balancing')), edge_ids TEXT NOT NULL, created_at TEXT NOT NULL);",
  ].join('\n'),
};

const MIGRATIONS: MigrationDefinition[] = [
  { version: 1, name: 'framework', key: '001_framework' },
  { version: 2, name: 'mechanism_graph', key: '002_mechanism_graph' },
  { version: 3, name: 'feedback_loops', key: '003_feedback_loops' },
];

export const SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;

const hasMetadataTable = (db: Database.Database): boolean => Boolean(db.prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='world_model_metadata'").get());
const hashSql = (sql: string): string => createHash('sha256').update(sql).digest('hex');
const loadMigrationSql = (key: string): string => {
  const sql = INLINE_MIGRATIONS[key];
  if (!sql) throw new Error(`Missing inline migration: ${key}`);
  return sql;
};

export const readSchemaVersion = (db: Database.Database): number => {
  if (!hasMetadataTable(db)) return 0;
  const row = db.prepare('SELECT value FROM world_model_metadata WHERE key = ?').get('schema_version') as { value?: string } | undefined;
  const parsed = Number.parseInt(row?.value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : 0;
};

const writeSchemaVersion = (db: Database.Database, version: number): void => {
  db.prepare('INSERT INTO world_model_metadata (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value')
    .run('schema_version', String(version));
};

/**
 * Bring the database up to {@link SCHEMA_VERSION}. Each migration runs in its
 * own transaction together with the version bump.
 *
 * @throws SchemaError when the database was written by a newer schema
 */
export function applyMigrations(db: Database.Database): MigrationReport {
  const fromVersion = readSchemaVersion(db);
  if (fromVersion > SCHEMA_VERSION) {
    throw new SchemaError('world_model', SCHEMA_VERSION, fromVersion);
  }
  const pending = MIGRATIONS.filter((migration) => migration.version > fromVersion);
  const applied: AppliedMigration[] = [];
  for (const migration of pending) {
    const sql = loadMigrationSql(migration.key);
    db.transaction(() => {
      db.exec(sql);
      writeSchemaVersion(db, migration.version);
    })();
    applied.push({ version: migration.version, name: migration.name, checksum: hashSql(sql) });
  }
  return {
    fromVersion,
    toVersion: pending.length ? pending[pending.length - 1].version : fromVersion,
    applied,
  };
}
