/**
 * @fileoverview Feedback loop detection over the mechanism graph
 *
 * Cycle search is a bounded depth-first enumeration driven by an explicit
 * stack of (node, next-edge-index) frames. It is deterministic but not
 * exhaustive: `maxCycles` stops the whole search and `maxCycleLength` stops
 * each path, so on dense graphs some cycles are never visited.
 *
 * Live detection is a maintenance operation. Request paths read loops that
 * were mined earlier and persisted as `{loopId, loopType, edgeIds}`.
 */

import { createHash } from 'crypto';
import { DEFAULT_WORLD_MODEL_CONFIG } from '../config/world_model_config.js';
import type { LoopConfig } from '../config/world_model_config.js';
import { StorageError, toError } from '../core/errors.js';
import { Err, Ok } from '../core/result.js';
import type { Result } from '../core/result.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import type { StoreWriteResult, WorldModelStore } from '../storage/types.js';
import type { GraphLoader, GraphResult } from './graph_loader.js';
import type { MechanismGraphSnapshot } from './graph_snapshot.js';
import { computeLoopType } from './polarity.js';
import { NOT_SPECIFIED, formatNodeRef } from './types.js';
import type { DetectedLoop, EvidenceSpan, MechanismEdge, MechanismNode } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CycleSearchOptions {
  maxCycles: number;
  maxCycleLength: number;
}

interface SearchFrame {
  nodeId: string;
  nextEdge: number;
}

/** Spans cited per edge in a loop's evidence. */
const SPANS_PER_EDGE = 2;

// ============================================================================
// CYCLE SEARCH
// ============================================================================

const isEvidenced = (edge: MechanismEdge): boolean => edge.spanCount > 0;

/** Dedup key of a cycle: its edge ids, sorted. */
export function cycleKey(edges: readonly MechanismEdge[]): string {
  return edges.map((edge) => edge.id).sort().join('|');
}

/**
 * Deterministic loop id derived from the loop's edge set, so re-mining the
 * same cycle yields the same id.
 */
export function computeLoopId(edgeIds: readonly string[]): string {
  const digest = createHash('sha256').update([...edgeIds].sort().join('|')).digest('hex');
  return `loop_${digest.slice(0, 32)}`;
}

/**
 * Enumerate simple cycles of at least two evidenced edges.
 *
 * Start nodes are taken in id order and each search only walks through nodes
 * ordered after its start, so every cycle is reported from its smallest node
 * id. Outgoing edges are followed in edge-id order. Self-loops and edges
 * without evidence are never followed.
 */
export function findCycles(
  snapshot: MechanismGraphSnapshot,
  options: CycleSearchOptions,
): MechanismEdge[][] {
  const cycles: MechanismEdge[][] = [];
  const seen = new Set<string>();
  if (options.maxCycles <= 0 || options.maxCycleLength < 2) return cycles;

  const followable = (nodeId: string): MechanismEdge[] =>
    snapshot.getOutgoing(nodeId).filter((edge) => isEvidenced(edge) && edge.toNode !== edge.fromNode);

  for (const startId of snapshot.nodeIds) {
    if (cycles.length >= options.maxCycles) break;

    const stack: SearchFrame[] = [{ nodeId: startId, nextEdge: 0 }];
    const path: MechanismEdge[] = [];
    const onPath = new Set<string>([startId]);

    while (stack.length > 0 && cycles.length < options.maxCycles) {
      const frame = stack[stack.length - 1];
      const outgoing = followable(frame.nodeId);

      if (frame.nextEdge >= outgoing.length) {
        stack.pop();
        onPath.delete(frame.nodeId);
        path.pop();
        continue;
      }

      const edge = outgoing[frame.nextEdge];
      frame.nextEdge += 1;

      if (edge.toNode === startId) {
        if (path.length >= 1) {
          const cycle = [...path, edge];
          const key = cycleKey(cycle);
          if (!seen.has(key)) {
            seen.add(key);
            cycles.push(cycle);
          }
        }
        continue;
      }

      if (edge.toNode < startId || onPath.has(edge.toNode)) continue;
      // Extending would leave no room for the closing edge.
      if (path.length + 1 >= options.maxCycleLength) continue;

      path.push(edge);
      onPath.add(edge.toNode);
      stack.push({ nodeId: edge.toNode, nextEdge: 0 });
    }
  }

  return cycles;
}

// ============================================================================
// LOOP CONSTRUCTION
// ============================================================================

/**
 * Build a DetectedLoop from a cycle in traversal order. Returns null when an
 * endpoint cannot be resolved.
 */
export function buildDetectedLoop(
  loopId: string,
  cycle: readonly MechanismEdge[],
  resolveNode: (nodeId: string) => MechanismNode | undefined,
  spans: ReadonlyMap<string, EvidenceSpan[]>,
): DetectedLoop | null {
  const fromNodes: MechanismNode[] = [];
  for (const edge of cycle) {
    const node = resolveNode(edge.fromNode);
    if (!node || !resolveNode(edge.toNode)) return null;
    fromNodes.push(node);
  }

  const polarities = cycle.map((edge) => edge.polarity);
  return {
    loopId,
    loopType: computeLoopType(polarities),
    edgeIds: cycle.map((edge) => edge.id),
    nodes: fromNodes.map((node) => formatNodeRef(node.refKind, node.refId)),
    nodeLabels: fromNodes.map((node) => node.label),
    polarities,
    relationTypes: cycle.map((edge) => edge.relationType),
    evidenceSpans: cycle.flatMap((edge) => (spans.get(edge.id) ?? []).slice(0, SPANS_PER_EDGE)),
  };
}

/**
 * Detect loops live from the current graph.
 *
 * Searches for up to twice `maxLoops` cycles, keeps the shortest `maxLoops`
 * and hydrates spans for the kept edges only.
 */
export async function detectLoops(
  loader: GraphLoader,
  options: Partial<LoopConfig> = {},
): Promise<GraphResult<DetectedLoop[]>> {
  const { maxLoops, maxCycleLength } = { ...DEFAULT_WORLD_MODEL_CONFIG.loops, ...options };

  const snapshotResult = await loader.loadSnapshot();
  if (!snapshotResult.ok) return snapshotResult;
  const snapshot = snapshotResult.value;

  const cycles = findCycles(snapshot, { maxCycles: maxLoops * 2, maxCycleLength })
    .map((cycle, index) => ({ cycle, index }))
    .sort((a, b) => a.cycle.length - b.cycle.length || a.index - b.index)
    .slice(0, maxLoops)
    .map(({ cycle }) => cycle);

  const edgeIds = new Set(cycles.flatMap((cycle) => cycle.map((edge) => edge.id)));
  const spansResult = await loader.loadSpans(edgeIds);
  if (!spansResult.ok) return spansResult;

  const loops: DetectedLoop[] = [];
  for (const cycle of cycles) {
    const loop = buildDetectedLoop(
      computeLoopId(cycle.map((edge) => edge.id)),
      cycle,
      (nodeId) => snapshot.getNode(nodeId),
      spansResult.value,
    );
    if (loop) loops.push(loop);
  }

  logDebug('Detected feedback loops', { nodes: snapshot.nodeCount, loops: loops.length });
  return Ok(loops);
}

// ============================================================================
// PERSISTENCE
// ============================================================================

export async function persistDetectedLoops(
  store: WorldModelStore,
  loops: readonly DetectedLoop[],
): Promise<Result<StoreWriteResult, StorageError>> {
  try {
    const result = await store.persistLoops(
      loops
        .filter((loop) => loop.edgeIds.length > 0)
        .map((loop) => ({ loopId: loop.loopId, loopType: loop.loopType, edgeIds: [...loop.edgeIds] })),
    );
    return Ok(result);
  } catch (error) {
    if (error instanceof StorageError) return Err(error);
    const cause = toError(error);
    return Err(new StorageError('write', false, `persist feedback loops: ${cause.message}`, cause));
  }
}

/** True when consecutive edges chain head to tail and the last closes on the first. */
function isClosedChain(edges: readonly MechanismEdge[]): boolean {
  return edges.every((edge, index) => edge.toNode === edges[(index + 1) % edges.length].fromNode);
}

/**
 * Rebuild persisted loops from the edge and node tables, shortest first.
 *
 * Loops referencing a missing or unevidenced edge, an unloadable node, or
 * edges that no longer form a cycle are skipped before the `maxLoops` cut.
 * The loop type is recomputed from current polarities.
 */
export async function loadPersistedLoops(
  loader: GraphLoader,
  maxLoops: number = DEFAULT_WORLD_MODEL_CONFIG.loops.maxLoops,
): Promise<GraphResult<DetectedLoop[]>> {
  const persistedResult = await loader.loadPersistedLoops();
  if (!persistedResult.ok) return persistedResult;
  const persisted = persistedResult.value;
  if (persisted.length === 0 || maxLoops <= 0) return Ok([]);

  const allEdgeIds = [...new Set(persisted.flatMap((loop) => loop.edgeIds))].sort();
  const edgesResult = await loader.loadEdgesByIds(allEdgeIds);
  if (!edgesResult.ok) return edgesResult;
  const edgesById = new Map(edgesResult.value.map((edge) => [edge.id, edge]));

  const nodeIds = [...new Set(edgesResult.value.flatMap((edge) => [edge.fromNode, edge.toNode]))].sort();
  const nodesResult = await loader.loadNodesByIds(nodeIds);
  if (!nodesResult.ok) return nodesResult;
  const nodesById = new Map(nodesResult.value.map((node) => [node.id, node]));

  const spansResult = await loader.loadSpans(new Set(edgesById.keys()));
  if (!spansResult.ok) return spansResult;

  const loops: DetectedLoop[] = [];
  for (const stored of persisted) {
    const cycle: MechanismEdge[] = [];
    for (const edgeId of stored.edgeIds) {
      const edge = edgesById.get(edgeId);
      if (!edge || !isEvidenced(edge)) break;
      cycle.push(edge);
    }
    if (cycle.length !== stored.edgeIds.length || cycle.length < 2 || !isClosedChain(cycle)) {
      logWarning('Skipping persisted loop that no longer resolves', { loopId: stored.loopId });
      continue;
    }

    const loop = buildDetectedLoop(stored.loopId, cycle, (nodeId) => nodesById.get(nodeId), spansResult.value);
    if (!loop) {
      logWarning('Skipping persisted loop with unresolved nodes', { loopId: stored.loopId });
      continue;
    }
    if (loop.loopType !== stored.loopType) {
      logDebug('Persisted loop type differs from current polarities', {
        loopId: stored.loopId,
        stored: stored.loopType,
        computed: loop.loopType,
      });
    }
    loops.push(loop);
  }

  // Stable: equal lengths keep the store's loop-id order.
  loops.sort((a, b) => a.edgeIds.length - b.edgeIds.length);
  return Ok(loops.slice(0, maxLoops));
}

/**
 * Persisted loops touching any of the given pillars. With no pillars, the
 * first `maxLoops` loops are returned.
 */
export async function getLoopsForPillars(
  loader: GraphLoader,
  pillarIds: readonly string[],
  maxLoops: number = 10,
): Promise<GraphResult<DetectedLoop[]>> {
  const result = await loadPersistedLoops(loader, maxLoops * 2);
  if (!result.ok) return result;
  if (pillarIds.length === 0) return Ok(result.value.slice(0, maxLoops));

  const refs = new Set(pillarIds.map((id) => formatNodeRef('pillar', id)));
  return Ok(result.value.filter((loop) => loop.nodes.some((node) => refs.has(node))).slice(0, maxLoops));
}

/** Maximum characters of one quote in a loop summary. */
const SUMMARY_QUOTE_LIMIT = 100;

/**
 * One-line summary chaining the first three evidence quotes, generated from
 * evidence at read time.
 */
export function summarizeLoop(loop: DetectedLoop): string {
  const quotes = loop.evidenceSpans
    .slice(0, 3)
    .map((span) => span.quote.trim())
    .filter((quote) => quote.length > 0)
    .map((quote) => (quote.length > SUMMARY_QUOTE_LIMIT ? `${quote.slice(0, SUMMARY_QUOTE_LIMIT)}...` : quote));
  return quotes.length > 0 ? quotes.join(' ← ') : NOT_SPECIFIED;
}
