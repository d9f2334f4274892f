/**
 * @fileoverview Storage contract for the mechanism graph
 *
 * The reasoning core reads through this interface only. Loads never include
 * span bodies unless asked; spans are fetched for edges a caller has already
 * selected.
 */

import type {
  EvidenceSpan,
  FrameworkEntity,
  FrameworkRefKind,
  MechanismEdge,
  MechanismGraphStats,
  MechanismNode,
  PersistedLoop,
  Polarity,
  RelationType,
} from '../world_model/types.js';

export interface EdgeLoadOptions {
  includeSpans?: boolean;
}

export interface MechanismEdgeInput {
  id: string;
  fromNode: string;
  toNode: string;
  relationType: RelationType;
  /** Defaults to the relation's polarity. */
  polarity?: Polarity;
  /** Required when `polarity` departs from the relation default. */
  polarityOverridden?: boolean;
  confidence?: number;
}

export interface StoreWriteResult {
  written: number;
  skipped: number;
}

export interface WorldModelStore {
  initialize(): Promise<void>;
  close(): Promise<void>;
  isInitialized(): boolean;

  // Framework anchors
  upsertFrameworkEntities(entities: readonly FrameworkEntity[]): Promise<StoreWriteResult>;
  listFrameworkEntities(kind?: FrameworkRefKind): Promise<FrameworkEntity[]>;

  // Mechanism graph reads
  loadNodes(): Promise<MechanismNode[]>;
  loadNodesByIds(ids: readonly string[]): Promise<MechanismNode[]>;
  loadEdges(options?: EdgeLoadOptions): Promise<MechanismEdge[]>;
  loadEdgesByIds(ids: readonly string[], options?: EdgeLoadOptions): Promise<MechanismEdge[]>;
  loadSpans(edgeIds: ReadonlySet<string>): Promise<Map<string, EvidenceSpan[]>>;
  /** Shortest loops first (edge count, then loop id). All rows when `limit` is omitted. */
  loadPersistedLoops(limit?: number): Promise<PersistedLoop[]>;
  countGraphStats(): Promise<MechanismGraphStats>;

  // Mechanism graph writes (mining collaborator and CLI import)
  upsertNodes(nodes: readonly MechanismNode[]): Promise<StoreWriteResult>;
  upsertEdges(edges: readonly MechanismEdgeInput[]): Promise<StoreWriteResult>;
  insertSpans(spans: readonly EvidenceSpan[]): Promise<StoreWriteResult>;
  persistLoops(loops: readonly PersistedLoop[]): Promise<StoreWriteResult>;
}
