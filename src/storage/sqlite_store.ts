/**
 * @fileoverview SQLite-backed mechanism graph store
 *
 * Reference implementation of {@link WorldModelStore} on better-sqlite3.
 * File databases are guarded by a proper-lockfile lock so that only one
 * process writes the graph at a time; `:memory:` databases skip the lock.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs/promises';
import * as path from 'path';
import lockfile from 'proper-lockfile';
import { AnchorValidationError, StorageError, ValidationError, isValidationError, toError } from '../core/errors.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { getDefaultPolarity, toPolarity } from '../world_model/polarity.js';
import {
  isFrameworkRefKind,
  isRefKind,
  isRelationType,
} from '../world_model/types.js';
import type {
  EvidenceSpan,
  FrameworkEntity,
  FrameworkRefKind,
  LoopType,
  MechanismEdge,
  MechanismGraphStats,
  MechanismNode,
  PersistedLoop,
  RelationType,
} from '../world_model/types.js';
import { applyMigrations } from './migrations.js';
import type {
  EdgeLoadOptions,
  MechanismEdgeInput,
  StoreWriteResult,
  WorldModelStore,
} from './types.js';

// ============================================================================
// CONSTANTS
// ============================================================================

const IN_MEMORY_PATH = ':memory:';

/** Lock considered stale after this long without a refresh. */
const LOCK_STALE_TIMEOUT_MS = 10 * 60_000;

/** Refresh interval; must stay below half the stale timeout. */
const LOCK_UPDATE_INTERVAL_MS = 60_000;

const LOCK_MAX_RETRIES = 8;

const DEFAULT_EDGE_CONFIDENCE = 0.5;

// ============================================================================
// ROW TYPES
// ============================================================================

interface FrameworkEntityRow {
  kind: string;
  id: string;
  label: string;
  parent_id: string | null;
}

interface NodeRow {
  id: string;
  ref_kind: string;
  ref_id: string;
  label: string;
  source_id: string | null;
  anchor_id: string | null;
}

interface EdgeRow {
  id: string;
  from_node: string;
  to_node: string;
  relation_type: string;
  polarity: number;
  polarity_overridden: number;
  confidence: number;
  span_count: number;
  chunk_diversity: number;
}

interface SpanRow {
  edge_id: string;
  chunk_id: string;
  span_start: number;
  span_end: number;
  quote: string;
}

interface LoopRow {
  loop_id: string;
  loop_type: string;
  edge_ids: string;
}

interface CountRow {
  cnt: number;
}

// ============================================================================
// ROW MAPPERS
// ============================================================================

function rowToFrameworkEntity(row: FrameworkEntityRow): FrameworkEntity {
  if (!isFrameworkRefKind(row.kind)) {
    throw new StorageError('read', false, `framework_entity ${row.id} has unknown kind ${row.kind}`);
  }
  return { kind: row.kind, id: row.id, label: row.label, parentId: row.parent_id };
}

function rowToNode(row: NodeRow): MechanismNode {
  if (!isRefKind(row.ref_kind)) {
    throw new StorageError('read', false, `mechanism_node ${row.id} has unknown ref_kind ${row.ref_kind}`);
  }
  return {
    id: row.id,
    refKind: row.ref_kind,
    refId: row.ref_id,
    label: row.label,
    sourceId: row.source_id,
  };
}

function rowToEdge(row: EdgeRow): MechanismEdge {
  const polarity = toPolarity(row.polarity);
  if (!isRelationType(row.relation_type) || polarity === null) {
    throw new StorageError('read', false, `mechanism_edge ${row.id} has invalid relation ${row.relation_type}/${row.polarity}`);
  }
  return {
    id: row.id,
    fromNode: row.from_node,
    toNode: row.to_node,
    relationType: row.relation_type,
    polarity,
    confidence: row.confidence,
    spanCount: row.span_count,
    chunkDiversity: row.chunk_diversity,
    spans: [],
    polarityOverridden: row.polarity_overridden === 1,
  };
}

function rowToSpan(row: SpanRow): EvidenceSpan {
  return {
    edgeId: row.edge_id,
    chunkId: row.chunk_id,
    spanStart: row.span_start,
    spanEnd: row.span_end,
    quote: row.quote,
  };
}

function parseLoopType(value: string): LoopType | null {
  return value === 'reinforcing' || value === 'balancing' ? value : null;
}

function parseEdgeIds(value: string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return null;
  }
  if (!Array.isArray(parsed)) return null;
  const ids: string[] = [];
  for (const item of parsed) {
    if (typeof item !== 'string') return null;
    ids.push(item);
  }
  return ids;
}

const round3 = (value: number): number => Math.round(value * 1000) / 1000;

// ============================================================================
// SQL
// ============================================================================

const NODE_SELECT = `
  SELECT n.id, n.ref_kind, n.ref_id, n.label, n.source_id, f.id AS anchor_id
  FROM mechanism_node n
  LEFT JOIN framework_entity f ON f.kind = n.ref_kind AND f.id = n.ref_id`;

const EDGE_SELECT = `
  SELECT e.id, e.from_node, e.to_node, e.relation_type, e.polarity, e.polarity_overridden, e.confidence,
    COUNT(s.id) AS span_count, COUNT(DISTINCT s.chunk_id) AS chunk_diversity
  FROM mechanism_edge e
  LEFT JOIN mechanism_edge_span s ON s.edge_id = e.id`;

// ============================================================================
// SQLITE STORE IMPLEMENTATION
// ============================================================================

export class SqliteWorldModelStore implements WorldModelStore {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly lockPath: string;
  private releaseLock: (() => Promise<void>) | null = null;
  private lockCompromisedError: Error | null = null;
  private initialized = false;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
    this.lockPath = `${dbPath}.lock`;
  }

  private get inMemory(): boolean {
    return this.dbPath === IN_MEMORY_PATH;
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (!this.inMemory) {
      await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
      await fs.writeFile(this.dbPath, '', { flag: 'a' });
      await this.acquireLock();
    }

    try {
      this.db = new Database(this.dbPath);
      if (!this.inMemory) {
        this.db.pragma('journal_mode = WAL');
      }
      this.db.pragma('synchronous = NORMAL');
      this.db.pragma('foreign_keys = ON');
      this.db.pragma('busy_timeout = 5000');

      const report = applyMigrations(this.db);
      if (report.applied.length > 0) {
        logDebug('Applied world model migrations', {
          from: report.fromVersion,
          to: report.toVersion,
        });
      }
      this.initialized = true;
    } catch (error) {
      if (this.db) {
        this.db.close();
        this.db = null;
      }
      if (this.releaseLock) {
        await this.releaseLock().catch((lockError: unknown) => {
          logWarning('Failed to release lock during initialization cleanup', { path: this.lockPath, error: lockError });
        });
        this.releaseLock = null;
      }
      throw error;
    }
  }

  private async acquireLock(): Promise<void> {
    try {
      const isLocked = await lockfile.check(this.dbPath, { lockfilePath: this.lockPath, stale: LOCK_STALE_TIMEOUT_MS });
      if (isLocked) {
        logWarning('Existing lock detected, will attempt to acquire with stale recovery', { path: this.lockPath });
      }
    } catch (checkError) {
      logWarning('Lock check failed, proceeding with acquisition', {
        path: this.lockPath,
        error: toError(checkError).message,
      });
    }

    try {
      // proper-lockfile throws from a timer when a lock is compromised unless
      // onCompromised is provided.
      this.releaseLock = await lockfile.lock(this.dbPath, {
        lockfilePath: this.lockPath,
        stale: LOCK_STALE_TIMEOUT_MS,
        update: LOCK_UPDATE_INTERVAL_MS,
        onCompromised: (err) => {
          const error = toError(err);
          this.lockCompromisedError = error;
          logWarning('SQLite lock compromised; treating storage as unsafe', {
            path: this.lockPath,
            error: error.message,
          });
          try {
            if (this.db) {
              this.db.close();
              this.db = null;
            }
          } catch (closeError) {
            logWarning('Failed to close DB after lock compromise', { path: this.dbPath, error: closeError });
          }
          void this.releaseLock?.().catch((releaseError: unknown) => {
            logWarning('Failed to release lock after compromise', { path: this.lockPath, error: releaseError });
          });
        },
        retries: {
          retries: LOCK_MAX_RETRIES,
          factor: 1.5,
          minTimeout: 200,
          maxTimeout: 5_000,
        },
      });
    } catch (error) {
      throw new StorageError('lock', true, `database is locked: ${this.dbPath}`, toError(error));
    }
  }

  async close(): Promise<void> {
    try {
      if (this.db) {
        this.db.close();
        this.db = null;
      }
    } finally {
      this.initialized = false;
      if (this.releaseLock) {
        await this.releaseLock().catch((lockError: unknown) => {
          logWarning('Failed to release lock during close', { path: this.lockPath, error: lockError });
        });
        this.releaseLock = null;
      }
    }
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  private ensureDb(): Database.Database {
    if (this.lockCompromisedError) {
      throw new StorageError('lock', false, `lock compromised: ${this.lockCompromisedError.message}`, this.lockCompromisedError);
    }
    if (!this.db) {
      throw new StorageError('read', false, 'Storage not initialized. Call initialize() first.');
    }
    return this.db;
  }

  // --------------------------------------------------------------------------
  // Framework anchors
  // --------------------------------------------------------------------------

  async upsertFrameworkEntities(entities: readonly FrameworkEntity[]): Promise<StoreWriteResult> {
    const db = this.ensureDb();
    const stmt = db.prepare(`
      INSERT INTO framework_entity (kind, id, label, parent_id) VALUES (?, ?, ?, ?)
      ON CONFLICT(kind, id) DO UPDATE SET label = excluded.label, parent_id = excluded.parent_id
    `);
    const run = db.transaction((items: readonly FrameworkEntity[]) => {
      for (const entity of items) {
        if (!isFrameworkRefKind(entity.kind)) {
          throw new ValidationError('framework_entity.kind', 'pillar|core_value|sub_value', String(entity.kind));
        }
        stmt.run(entity.kind, entity.id, entity.label, entity.parentId ?? null);
      }
    });
    this.runWrite('upsert framework entities', () => run(entities));
    return { written: entities.length, skipped: 0 };
  }

  async listFrameworkEntities(kind?: FrameworkRefKind): Promise<FrameworkEntity[]> {
    const db = this.ensureDb();
    const rows = kind
      ? db.prepare('SELECT kind, id, label, parent_id FROM framework_entity WHERE kind = ? ORDER BY id').all(kind) as FrameworkEntityRow[]
      : db.prepare('SELECT kind, id, label, parent_id FROM framework_entity ORDER BY kind, id').all() as FrameworkEntityRow[];
    return rows.map(rowToFrameworkEntity);
  }

  // --------------------------------------------------------------------------
  // Mechanism graph reads
  // --------------------------------------------------------------------------

  async loadNodes(): Promise<MechanismNode[]> {
    const db = this.ensureDb();
    const rows = db.prepare(`${NODE_SELECT} ORDER BY n.id`).all() as NodeRow[];
    return this.anchoredNodes(rows);
  }

  async loadNodesByIds(ids: readonly string[]): Promise<MechanismNode[]> {
    if (ids.length === 0) return [];
    const db = this.ensureDb();
    const rows = db
      .prepare(`${NODE_SELECT} WHERE n.id IN (SELECT value FROM json_each(?)) ORDER BY n.id`)
      .all(JSON.stringify(ids)) as NodeRow[];
    return this.anchoredNodes(rows);
  }

  private anchoredNodes(rows: NodeRow[]): MechanismNode[] {
    const nodes: MechanismNode[] = [];
    const dropped: string[] = [];
    for (const row of rows) {
      if (isFrameworkRefKind(row.ref_kind) && row.anchor_id === null) {
        dropped.push(row.id);
        continue;
      }
      nodes.push(rowToNode(row));
    }
    if (dropped.length > 0) {
      logWarning('Dropped mechanism nodes without a framework anchor', {
        count: dropped.length,
        nodeIds: dropped.slice(0, 10),
      });
    }
    return nodes;
  }

  async loadEdges(options: EdgeLoadOptions = {}): Promise<MechanismEdge[]> {
    const db = this.ensureDb();
    const rows = db.prepare(`${EDGE_SELECT} GROUP BY e.id ORDER BY e.id`).all() as EdgeRow[];
    const edges = rows.map(rowToEdge);
    return options.includeSpans ? this.attachSpans(edges) : edges;
  }

  async loadEdgesByIds(ids: readonly string[], options: EdgeLoadOptions = {}): Promise<MechanismEdge[]> {
    if (ids.length === 0) return [];
    const db = this.ensureDb();
    const rows = db
      .prepare(`${EDGE_SELECT} WHERE e.id IN (SELECT value FROM json_each(?)) GROUP BY e.id ORDER BY e.id`)
      .all(JSON.stringify(ids)) as EdgeRow[];
    const edges = rows.map(rowToEdge);
    return options.includeSpans ? this.attachSpans(edges) : edges;
  }

  private async attachSpans(edges: MechanismEdge[]): Promise<MechanismEdge[]> {
    const spans = await this.loadSpans(new Set(edges.map((edge) => edge.id)));
    return edges.map((edge) => ({ ...edge, spans: spans.get(edge.id) ?? [] }));
  }

  async loadSpans(edgeIds: ReadonlySet<string>): Promise<Map<string, EvidenceSpan[]>> {
    const result = new Map<string, EvidenceSpan[]>();
    if (edgeIds.size === 0) return result;
    const db = this.ensureDb();
    const rows = db.prepare(`
      SELECT edge_id, chunk_id, span_start, span_end, quote
      FROM mechanism_edge_span
      WHERE edge_id IN (SELECT value FROM json_each(?))
      ORDER BY edge_id, span_start, id
    `).all(JSON.stringify([...edgeIds].sort())) as SpanRow[];
    for (const row of rows) {
      const list = result.get(row.edge_id) ?? [];
      list.push(rowToSpan(row));
      result.set(row.edge_id, list);
    }
    return result;
  }

  async loadPersistedLoops(limit?: number): Promise<PersistedLoop[]> {
    const db = this.ensureDb();
    const select = `
      SELECT loop_id, loop_type, edge_ids FROM feedback_loop
      ORDER BY CASE WHEN json_valid(edge_ids) THEN json_array_length(edge_ids) ELSE 0 END, loop_id
    `;
    const rows = (limit === undefined
      ? db.prepare(select).all()
      : db.prepare(`${select} LIMIT ?`).all(Math.max(0, Math.floor(limit)))) as LoopRow[];
    const loops: PersistedLoop[] = [];
    for (const row of rows) {
      const loopType = parseLoopType(row.loop_type);
      const edgeIds = parseEdgeIds(row.edge_ids);
      if (!loopType || !edgeIds || edgeIds.length === 0) {
        logWarning('Skipping malformed persisted loop', { loopId: row.loop_id });
        continue;
      }
      loops.push({ loopId: row.loop_id, loopType, edgeIds });
    }
    return loops;
  }

  async countGraphStats(): Promise<MechanismGraphStats> {
    const db = this.ensureDb();
    const count = (sql: string): number => (db.prepare(sql).get() as CountRow | undefined)?.cnt ?? 0;

    const edgesByRelation: Partial<Record<RelationType, number>> = {};
    const relationRows = db
      .prepare('SELECT relation_type, COUNT(*) AS cnt FROM mechanism_edge GROUP BY relation_type ORDER BY relation_type')
      .all() as Array<{ relation_type: string; cnt: number }>;
    for (const row of relationRows) {
      if (isRelationType(row.relation_type)) {
        edgesByRelation[row.relation_type] = row.cnt;
      }
    }

    const edgesByPillar: Record<string, number> = {};
    const pillarRows = db.prepare(`
      SELECT n.ref_id, COUNT(DISTINCT e.id) AS cnt
      FROM mechanism_edge e
      JOIN mechanism_node n ON (e.from_node = n.id OR e.to_node = n.id)
      WHERE n.ref_kind = 'pillar'
      GROUP BY n.ref_id
      ORDER BY n.ref_id
    `).all() as Array<{ ref_id: string; cnt: number }>;
    for (const row of pillarRows) {
      edgesByPillar[row.ref_id] = row.cnt;
    }

    const avgRow = db.prepare('SELECT AVG(confidence) AS avg_conf FROM mechanism_edge').get() as { avg_conf: number | null } | undefined;

    return {
      totalNodes: count('SELECT COUNT(*) AS cnt FROM mechanism_node'),
      totalEdges: count('SELECT COUNT(*) AS cnt FROM mechanism_edge'),
      edgesByPillar,
      edgesByRelation,
      edgesWithSpans: count('SELECT COUNT(DISTINCT edge_id) AS cnt FROM mechanism_edge_span'),
      avgConfidence: round3(avgRow?.avg_conf ?? 0),
      loopsCount: count('SELECT COUNT(*) AS cnt FROM feedback_loop'),
    };
  }

  // --------------------------------------------------------------------------
  // Mechanism graph writes
  // --------------------------------------------------------------------------

  async upsertNodes(nodes: readonly MechanismNode[]): Promise<StoreWriteResult> {
    const db = this.ensureDb();
    const anchorExists = db.prepare('SELECT 1 AS found FROM framework_entity WHERE kind = ? AND id = ?');
    const stmt = db.prepare(`
      INSERT INTO mechanism_node (id, ref_kind, ref_id, label, source_id) VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        ref_kind = excluded.ref_kind,
        ref_id = excluded.ref_id,
        label = excluded.label,
        source_id = excluded.source_id
    `);
    const run = db.transaction((items: readonly MechanismNode[]) => {
      for (const node of items) {
        const ref = `${node.refKind}:${node.refId}`;
        if (!isRefKind(node.refKind)) {
          throw new AnchorValidationError(node.id, ref, 'unknown ref kind');
        }
        if (!node.label.trim()) {
          throw new AnchorValidationError(node.id, ref, 'label is empty');
        }
        if (isFrameworkRefKind(node.refKind) && !anchorExists.get(node.refKind, node.refId)) {
          throw new AnchorValidationError(node.id, ref, 'no such framework entity');
        }
        stmt.run(node.id, node.refKind, node.refId, node.label, node.sourceId ?? null);
      }
    });
    this.runWrite('upsert mechanism nodes', () => run(nodes));
    return { written: nodes.length, skipped: 0 };
  }

  async upsertEdges(edges: readonly MechanismEdgeInput[]): Promise<StoreWriteResult> {
    const db = this.ensureDb();
    const nodeExists = db.prepare('SELECT 1 AS found FROM mechanism_node WHERE id = ?');
    const stmt = db.prepare(`
      INSERT INTO mechanism_edge (id, from_node, to_node, relation_type, polarity, polarity_overridden, confidence)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        from_node = excluded.from_node,
        to_node = excluded.to_node,
        relation_type = excluded.relation_type,
        polarity = excluded.polarity,
        polarity_overridden = excluded.polarity_overridden,
        confidence = excluded.confidence
    `);
    const run = db.transaction((items: readonly MechanismEdgeInput[]) => {
      for (const edge of items) {
        if (!isRelationType(edge.relationType)) {
          throw new ValidationError(`mechanism_edge(${edge.id}).relationType`, 'known relation type', String(edge.relationType));
        }
        const defaultPolarity = getDefaultPolarity(edge.relationType);
        const polarity = edge.polarity ?? defaultPolarity;
        if (polarity !== defaultPolarity && !edge.polarityOverridden) {
          throw new ValidationError(
            `mechanism_edge(${edge.id}).polarity`,
            `${defaultPolarity} for ${edge.relationType} unless polarityOverridden`,
            String(polarity),
          );
        }
        const confidence = edge.confidence ?? DEFAULT_EDGE_CONFIDENCE;
        if (!(confidence >= 0 && confidence <= 1)) {
          throw new ValidationError(`mechanism_edge(${edge.id}).confidence`, 'number in [0, 1]', String(confidence));
        }
        for (const endpoint of [edge.fromNode, edge.toNode]) {
          if (!nodeExists.get(endpoint)) {
            throw new ValidationError(`mechanism_edge(${edge.id}).endpoint`, 'existing mechanism node', endpoint);
          }
        }
        stmt.run(
          edge.id,
          edge.fromNode,
          edge.toNode,
          edge.relationType,
          polarity,
          polarity !== defaultPolarity ? 1 : 0,
          confidence,
        );
      }
    });
    this.runWrite('upsert mechanism edges', () => run(edges));
    return { written: edges.length, skipped: 0 };
  }

  async insertSpans(spans: readonly EvidenceSpan[]): Promise<StoreWriteResult> {
    const db = this.ensureDb();
    const stmt = db.prepare(`
      INSERT OR IGNORE INTO mechanism_edge_span (edge_id, chunk_id, span_start, span_end, quote)
      VALUES (?, ?, ?, ?, ?)
    `);
    const run = db.transaction((items: readonly EvidenceSpan[]): number => {
      let written = 0;
      for (const span of items) {
        if (!span.quote.trim()) {
          throw new ValidationError(`mechanism_edge_span(${span.edgeId}).quote`, 'non-empty quote', 'empty string');
        }
        if (span.spanEnd < span.spanStart) {
          throw new ValidationError(`mechanism_edge_span(${span.edgeId}).spanEnd`, `>= ${span.spanStart}`, String(span.spanEnd));
        }
        written += stmt.run(span.edgeId, span.chunkId, span.spanStart, span.spanEnd, span.quote).changes;
      }
      return written;
    });
    const written = this.runWrite('insert evidence spans', () => run(spans));
    return { written, skipped: spans.length - written };
  }

  async persistLoops(loops: readonly PersistedLoop[]): Promise<StoreWriteResult> {
    const db = this.ensureDb();
    const stmt = db.prepare(`
      INSERT INTO feedback_loop (loop_id, loop_type, edge_ids, created_at) VALUES (?, ?, ?, ?)
      ON CONFLICT(loop_id) DO NOTHING
    `);
    const createdAt = new Date().toISOString();
    const run = db.transaction((items: readonly PersistedLoop[]): number => {
      let written = 0;
      for (const loop of items) {
        if (loop.edgeIds.length === 0) continue;
        written += stmt.run(loop.loopId, loop.loopType, JSON.stringify(loop.edgeIds), createdAt).changes;
      }
      return written;
    });
    const written = this.runWrite('persist feedback loops', () => run(loops));
    return { written, skipped: loops.length - written };
  }

  /**
   * Run a write transaction. Validation errors pass through; driver errors
   * become StorageError.
   */
  private runWrite<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isValidationError(error) || error instanceof StorageError) {
        throw error;
      }
      const cause = toError(error);
      throw new StorageError('write', false, `${operation}: ${cause.message}`, cause);
    }
  }
}

export function createSqliteWorldModelStore(dbPath: string): SqliteWorldModelStore {
  return new SqliteWorldModelStore(dbPath);
}
