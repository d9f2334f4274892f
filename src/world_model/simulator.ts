/**
 * @fileoverview Damped what-if propagation over the mechanism graph
 *
 * Every node starts at a neutral value. A change to one node spreads along
 * outgoing edges one hop per step, scaled by evidence weight, polarity,
 * confidence and a damping factor. Results explain how framework links
 * connect; they are not forecasts, and every result carries a fixed
 * disclaimer label.
 */

import { DEFAULT_WORLD_MODEL_CONFIG } from '../config/world_model_config.js';
import type { ConfidenceConfig, SimulationConfig } from '../config/world_model_config.js';
import { Ok } from '../core/result.js';
import { computeEvidenceBase } from './confidence.js';
import type { GraphLoader, GraphResult } from './graph_loader.js';
import type { MechanismGraphSnapshot } from './graph_snapshot.js';
import { formatNodeRef } from './types.js';
import type {
  MechanismEdge,
  PropagationStep,
  RelationType,
  SimulationResult,
  WhatIfPillarResult,
  WhatIfResult,
} from './types.js';

export const SIMULATION_LABEL = 'approximate simulation based on framework links';

const round4 = (value: number): number => Math.round(value * 10000) / 10000;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Signed propagation weight of an edge:
 * evidence base × polarity × confidence.
 */
export function computeEdgeWeight(
  edge: MechanismEdge,
  confidence: ConfidenceConfig = DEFAULT_WORLD_MODEL_CONFIG.confidence,
): number {
  return computeEvidenceBase(edge.spanCount, edge.chunkDiversity, confidence) * edge.polarity * edge.confidence;
}

interface PendingDelta {
  delta: number;
  edgeIds: string[];
  relations: RelationType[];
}

/**
 * Propagate a change of `magnitude` at `changedNodeId`.
 *
 * In each step, the nodes changed by the previous step push
 * `value × weight × damping` along each evidenced outgoing edge. Contributions
 * to one target are summed; sums below the threshold are dropped. The walk
 * stops once a step changes nothing or after `maxSteps` steps.
 */
export function propagateChange(
  snapshot: MechanismGraphSnapshot,
  changedNodeId: string,
  magnitude: number,
  config: SimulationConfig = DEFAULT_WORLD_MODEL_CONFIG.simulation,
  confidence: ConfidenceConfig = DEFAULT_WORLD_MODEL_CONFIG.confidence,
): SimulationResult {
  const { defaultNodeValue, dampingFactor, minDeltaThreshold, maxSteps } = config;

  const state = new Map<string, number>();
  for (const nodeId of snapshot.nodeIds) state.set(nodeId, defaultNodeValue);
  const initialState = Object.fromEntries([...state].map(([nodeId, value]) => [nodeId, round4(value)]));

  const known = state.has(changedNodeId);
  if (known) state.set(changedNodeId, clamp01(defaultNodeValue + magnitude));

  const propagationSteps: PropagationStep[] = [];
  let affected = known ? [changedNodeId] : [];

  for (let step = 1; step <= maxSteps && affected.length > 0; step++) {
    const pending = new Map<string, PendingDelta>();

    for (const sourceId of affected) {
      const sourceValue = state.get(sourceId) ?? defaultNodeValue;
      for (const edge of snapshot.getOutgoing(sourceId)) {
        if (edge.spanCount === 0) continue;
        const delta = sourceValue * computeEdgeWeight(edge, confidence) * dampingFactor;
        const entry = pending.get(edge.toNode) ?? { delta: 0, edgeIds: [], relations: [] };
        entry.delta += delta;
        entry.edgeIds.push(edge.id);
        entry.relations.push(edge.relationType);
        pending.set(edge.toNode, entry);
      }
    }

    const next: string[] = [];
    for (const targetId of [...pending.keys()].sort()) {
      const entry = pending.get(targetId);
      if (!entry || Math.abs(entry.delta) < minDeltaThreshold) continue;
      const newValue = clamp01((state.get(targetId) ?? defaultNodeValue) + entry.delta);
      state.set(targetId, newValue);
      propagationSteps.push({
        step,
        nodeId: targetId,
        nodeLabel: snapshot.labelOf(targetId),
        delta: round4(entry.delta),
        newValue: round4(newValue),
        viaEdgeIds: entry.edgeIds,
        viaRelations: entry.relations,
      });
      next.push(targetId);
    }
    affected = next;
  }

  const finalState: Record<string, number> = {};
  for (const [nodeId, value] of state) {
    if (Math.abs(value - defaultNodeValue) > minDeltaThreshold) {
      finalState[nodeId] = round4(value);
    }
  }

  return {
    changedNodeId: known ? changedNodeId : null,
    magnitude,
    initialState,
    finalState,
    propagationSteps,
    label: SIMULATION_LABEL,
  };
}

export function emptySimulation(magnitude: number, reason: string): SimulationResult {
  return {
    changedNodeId: null,
    magnitude,
    initialState: {},
    finalState: {},
    propagationSteps: [],
    label: `${SIMULATION_LABEL}: ${reason}`,
  };
}

/**
 * Simulate a change to the node addressed as `kind:refId`. An empty graph or
 * an unknown node yields an empty result whose label says why.
 */
export async function simulateChange(
  loader: GraphLoader,
  nodeRef: string,
  magnitude: number,
  config: SimulationConfig = DEFAULT_WORLD_MODEL_CONFIG.simulation,
  confidence: ConfidenceConfig = DEFAULT_WORLD_MODEL_CONFIG.confidence,
): Promise<GraphResult<SimulationResult>> {
  const snapshotResult = await loader.loadSnapshot();
  if (!snapshotResult.ok) return snapshotResult;
  const snapshot = snapshotResult.value;

  if (snapshot.isEmpty || snapshot.edges.length === 0) {
    return Ok(emptySimulation(magnitude, 'not enough data'));
  }
  const node = snapshot.getNodeByRef(nodeRef);
  if (!node) {
    return Ok(emptySimulation(magnitude, `node not found: ${nodeRef}`));
  }
  return Ok(propagateChange(snapshot, node.id, magnitude, config, confidence));
}

/**
 * Run one simulation per pillar change over a single snapshot. Combined
 * impacts keep the highest final value each node reaches in any run.
 */
export async function simulateWhatIf(
  loader: GraphLoader,
  scenario: string,
  pillarChanges: Readonly<Record<string, number>>,
  config: SimulationConfig = DEFAULT_WORLD_MODEL_CONFIG.simulation,
  confidence: ConfidenceConfig = DEFAULT_WORLD_MODEL_CONFIG.confidence,
): Promise<GraphResult<WhatIfResult>> {
  const snapshotResult = await loader.loadSnapshot();
  if (!snapshotResult.ok) return snapshotResult;
  const snapshot = snapshotResult.value;

  const results: WhatIfPillarResult[] = [];
  const combinedImpacts: Record<string, number> = {};

  for (const [pillarId, magnitude] of Object.entries(pillarChanges)) {
    const node = snapshot.getNodeByRef(formatNodeRef('pillar', pillarId));
    if (!node) continue;
    const simulation = propagateChange(snapshot, node.id, magnitude, config, confidence);
    results.push({
      pillarId,
      magnitude,
      finalState: simulation.finalState,
      propagationSteps: simulation.propagationSteps,
    });
    for (const [nodeId, value] of Object.entries(simulation.finalState)) {
      const previous = combinedImpacts[nodeId];
      combinedImpacts[nodeId] = previous === undefined ? value : Math.max(previous, value);
    }
  }

  return Ok({ scenario, results, combinedImpacts, label: SIMULATION_LABEL });
}

export interface SimulationSummaryEntry {
  nodeId: string;
  nodeLabel: string;
  value: number;
}

/**
 * Up to `limit` moved nodes other than the changed one, largest movement
 * first, ties by node id.
 */
export function summarizeSimulation(
  result: SimulationResult,
  snapshot: MechanismGraphSnapshot,
  limit: number = 3,
): SimulationSummaryEntry[] {
  return Object.entries(result.finalState)
    .filter(([nodeId]) => nodeId !== result.changedNodeId)
    .map(([nodeId, value]) => ({ nodeId, nodeLabel: snapshot.labelOf(nodeId), value }))
    .sort((a, b) => {
      const moved = (entry: SimulationSummaryEntry): number =>
        Math.abs(entry.value - (result.initialState[entry.nodeId] ?? DEFAULT_WORLD_MODEL_CONFIG.simulation.defaultNodeValue));
      const byMovement = moved(b) - moved(a);
      return byMovement !== 0 ? byMovement : a.nodeId < b.nodeId ? -1 : a.nodeId > b.nodeId ? 1 : 0;
    })
    .slice(0, limit);
}
