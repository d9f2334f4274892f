/**
 * @fileoverview Result-returning access to the mechanism graph store
 *
 * Store implementations throw; the loader converts every failure into a
 * GraphLoadError value so no exception escapes into the reasoning code.
 */

import { Errors } from '../core/errors.js';
import type { GraphLoadError, GraphLoadSource } from '../core/errors.js';
import { Ok, mapError, safeAsync } from '../core/result.js';
import type { Result } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import type { EdgeLoadOptions, WorldModelStore } from '../storage/types.js';
import { MechanismGraphSnapshot } from './graph_snapshot.js';
import type {
  EvidenceSpan,
  MechanismEdge,
  MechanismGraphStats,
  MechanismNode,
  PersistedLoop,
} from './types.js';

export type GraphResult<T> = Result<T, GraphLoadError>;

export class GraphLoader {
  constructor(private readonly store: WorldModelStore) {}

  loadNodes(): Promise<GraphResult<MechanismNode[]>> {
    return this.guard('nodes', () => this.store.loadNodes());
  }

  loadNodesByIds(ids: readonly string[]): Promise<GraphResult<MechanismNode[]>> {
    return this.guard('nodes', () => this.store.loadNodesByIds(ids));
  }

  /** Topology only unless `includeSpans` is set. */
  loadEdges(options: EdgeLoadOptions = {}): Promise<GraphResult<MechanismEdge[]>> {
    return this.guard('edges', () => this.store.loadEdges(options));
  }

  loadEdgesByIds(ids: readonly string[], options: EdgeLoadOptions = {}): Promise<GraphResult<MechanismEdge[]>> {
    return this.guard('edges', () => this.store.loadEdgesByIds(ids, options));
  }

  loadSpans(edgeIds: ReadonlySet<string>): Promise<GraphResult<Map<string, EvidenceSpan[]>>> {
    if (edgeIds.size === 0) {
      return Promise.resolve(Ok(new Map<string, EvidenceSpan[]>()));
    }
    return this.guard('spans', () => this.store.loadSpans(edgeIds));
  }

  loadPersistedLoops(limit?: number): Promise<GraphResult<PersistedLoop[]>> {
    return this.guard('loops', () => this.store.loadPersistedLoops(limit));
  }

  loadStats(): Promise<GraphResult<MechanismGraphStats>> {
    return this.guard('stats', () => this.store.countGraphStats());
  }

  /**
   * Load nodes and edge topology into an immutable snapshot. Either load
   * failing fails the whole snapshot.
   */
  async loadSnapshot(): Promise<GraphResult<MechanismGraphSnapshot>> {
    const nodes = await this.loadNodes();
    if (!nodes.ok) return nodes;
    const edges = await this.loadEdges();
    if (!edges.ok) return edges;

    const snapshot = MechanismGraphSnapshot.fromRecords(nodes.value, edges.value);
    if (snapshot.danglingEdgeCount > 0) {
      logDebug('Ignoring edges with unloaded endpoints', { count: snapshot.danglingEdgeCount });
    }
    return Ok(snapshot);
  }

  private async guard<T>(source: GraphLoadSource, fn: () => Promise<T>): Promise<GraphResult<T>> {
    return mapError(await safeAsync(fn), (error) => Errors.graphLoad(source, error));
  }
}
