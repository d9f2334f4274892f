/**
 * @fileoverview Evidence-bound intervention planning
 *
 * A plan walks backward from a goal node through incoming mechanism edges to
 * find leverage points, then orders them farthest-first so the plan reads
 * "start here, then ..., then reach the goal".
 *
 * Hard gates:
 * - every step anchors to a loaded mechanism node; nothing is invented
 * - labels with medical or diagnostic language are dropped (claims gate)
 * - leading indicators come from CONDITIONAL_ON edges only; otherwise a
 *   single "not specified" placeholder is emitted
 *
 * Planning runs on a topology-only snapshot. Spans are loaded once, after the
 * plan skeleton is fixed, and only for edges the plan cites.
 */

import { DEFAULT_WORLD_MODEL_CONFIG } from '../config/world_model_config.js';
import type { PlannerConfig } from '../config/world_model_config.js';
import { Ok } from '../core/result.js';
import { validateNoMedicalClaims } from './claims_gate.js';
import type { GraphLoader, GraphResult } from './graph_loader.js';
import type { MechanismGraphSnapshot } from './graph_snapshot.js';
import { normalizeArabicText } from './text_normalize.js';
import { NOT_SPECIFIED, formatNodeRef, parseNodeRef } from './types.js';
import type {
  DetectedLoop,
  EntityRef,
  EvidenceSpan,
  ImbalanceRisk,
  InterventionPlan,
  InterventionStep,
  LeadingIndicator,
  MechanismEdge,
  MechanismNode,
  NodeRef,
  RiskRelationType,
} from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface InterventionRequest {
  goal: string;
  detectedEntities?: readonly EntityRef[];
  /** Previously detected loops, used to backfill short plans. */
  loops?: readonly DetectedLoop[];
  maxSteps?: number;
  maxDepth?: number;
}

export const GOAL_NOT_FOUND = 'goal not found in framework';

/** Citations kept per edge on a step or risk. */
const CITATIONS_PER_EDGE = 2;

interface LeveragePoint {
  node: MechanismNode;
  edge: MechanismEdge;
  depth: number;
}

type StepDraft =
  | { kind: 'edge'; node: MechanismNode; edge: MechanismEdge | null; impacts: MechanismEdge[] }
  | { kind: 'loop'; node: MechanismNode; spans: EvidenceSpan[] };

interface IndicatorDraft {
  node: MechanismNode;
  edge: MechanismEdge;
}

interface RiskDraft {
  edge: MechanismEdge & { relationType: RiskRelationType };
  from: MechanismNode;
  to: MechanismNode;
}

/** Plan structure decided from topology alone, before spans are loaded. */
export interface InterventionDraft {
  goal: string;
  goalNode: MechanismNode | null;
  steps: StepDraft[];
  indicators: IndicatorDraft[];
  risks: RiskDraft[];
}

// ============================================================================
// GOAL RESOLUTION AND BACKWARD TRACE
// ============================================================================

const isEvidenced = (edge: MechanismEdge | null): edge is MechanismEdge => edge !== null && edge.spanCount > 0;

/**
 * Detected entities win by exact `kind:refId`; otherwise the first node (by
 * id) whose folded label contains the folded goal, or is contained by it.
 */
export function resolveGoalNode(
  snapshot: MechanismGraphSnapshot,
  goal: string,
  entities: readonly EntityRef[] = [],
): MechanismNode | null {
  for (const entity of entities) {
    if (!entity.refKind || !entity.refId) continue;
    const node = snapshot.getNodeByRef(formatNodeRef(entity.refKind, entity.refId));
    if (node) return node;
  }

  const normalizedGoal = normalizeArabicText(goal);
  if (!normalizedGoal) return null;
  for (const nodeId of snapshot.nodeIds) {
    const node = snapshot.getNode(nodeId);
    if (!node) continue;
    const label = normalizeArabicText(node.label);
    if (!label) continue;
    if (normalizedGoal.includes(label) || label.includes(normalizedGoal)) {
      return node;
    }
  }
  return null;
}

/**
 * Breadth-first walk over incoming edges. Each node is recorded once, at the
 * first depth that reaches it, with the edge that reached it.
 */
export function traceLeveragePoints(
  snapshot: MechanismGraphSnapshot,
  goalNode: MechanismNode,
  maxDepth: number,
): LeveragePoint[] {
  const results: LeveragePoint[] = [];
  const visited = new Set<string>([goalNode.id]);
  let frontier = [goalNode.id];

  for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth++) {
    const next: string[] = [];
    for (const nodeId of frontier) {
      for (const edge of snapshot.getIncoming(nodeId)) {
        if (visited.has(edge.fromNode)) continue;
        const node = snapshot.getNode(edge.fromNode);
        if (!node) continue;
        visited.add(node.id);
        results.push({ node, edge, depth });
        next.push(node.id);
      }
    }
    frontier = next;
  }

  return results;
}

// ============================================================================
// DRAFTING
// ============================================================================

function positiveImpacts(snapshot: MechanismGraphSnapshot, node: MechanismNode, limit: number): MechanismEdge[] {
  return snapshot
    .getOutgoing(node.id)
    .filter((edge) => edge.polarity > 0 && snapshot.getNode(edge.toNode) !== undefined)
    .slice(0, limit);
}

const stepKey = (node: MechanismNode): NodeRef => formatNodeRef(node.refKind, node.refId);

function loopBackfill(
  snapshot: MechanismGraphSnapshot,
  goalNode: MechanismNode,
  loops: readonly DetectedLoop[],
  existing: readonly StepDraft[],
  needed: number,
  loopCount: number,
): StepDraft[] {
  const goalRef = stepKey(goalNode);
  const taken = new Set(existing.map((step) => stepKey(step.node)));
  const added: StepDraft[] = [];

  const touching = loops.filter((loop) => loop.nodes.includes(goalRef)).slice(0, loopCount);
  for (const loop of touching) {
    for (let index = 0; index < loop.nodes.length && added.length < needed; index++) {
      const ref = loop.nodes[index];
      if (taken.has(ref) || parseNodeRef(ref) === null) continue;
      const node = snapshot.getNodeByRef(ref);
      if (!node || !validateNoMedicalClaims(node.label)) continue;
      taken.add(ref);
      const edgeId = loop.edgeIds[index];
      added.push({
        kind: 'loop',
        node,
        spans: loop.evidenceSpans.filter((span) => span.edgeId === edgeId).slice(0, CITATIONS_PER_EDGE),
      });
    }
  }
  return added;
}

function isRiskEdge(edge: MechanismEdge): edge is MechanismEdge & { relationType: RiskRelationType } {
  return edge.polarity < 0 && (edge.relationType === 'INHIBITS' || edge.relationType === 'TENSION_WITH');
}

/**
 * Decide the plan's structure from topology. Pure; no spans needed.
 */
export function draftInterventionPlan(
  snapshot: MechanismGraphSnapshot,
  request: InterventionRequest,
  config: PlannerConfig = DEFAULT_WORLD_MODEL_CONFIG.planner,
): InterventionDraft {
  const maxSteps = Math.max(1, request.maxSteps ?? config.maxSteps);
  const maxDepth = request.maxDepth ?? config.maxDepth;

  const goalNode = resolveGoalNode(snapshot, request.goal, request.detectedEntities);
  if (!goalNode) {
    return { goal: request.goal, goalNode: null, steps: [], indicators: [], risks: [] };
  }

  // Farthest first; Array.prototype.sort is stable so BFS order breaks ties.
  const leverage = traceLeveragePoints(snapshot, goalNode, maxDepth)
    .sort((a, b) => b.depth - a.depth)
    .filter((point) => validateNoMedicalClaims(point.node.label))
    .slice(0, maxSteps - 1);

  const steps: StepDraft[] = leverage.map((point) => ({
    kind: 'edge',
    node: point.node,
    edge: point.edge,
    impacts: positiveImpacts(snapshot, point.node, config.maxImpactsPerStep),
  }));

  const goalStep: StepDraft | null = validateNoMedicalClaims(goalNode.label)
    ? {
      kind: 'edge',
      node: goalNode,
      edge: snapshot.getIncoming(goalNode.id).find((edge) => edge.spanCount > 0) ?? null,
      impacts: [],
    }
    : null;

  const stepCount = steps.length + (goalStep ? 1 : 0);
  if (stepCount < config.minSteps && request.loops && request.loops.length > 0) {
    const existing = goalStep ? [...steps, goalStep] : steps;
    // Short plans are filled from loops up to the full step budget.
    const needed = maxSteps - stepCount;
    steps.push(...loopBackfill(snapshot, goalNode, request.loops, existing, needed, config.backfillLoopCount));
  }
  if (goalStep) steps.push(goalStep);

  const indicators: IndicatorDraft[] = [];
  for (const edge of snapshot.getIncoming(goalNode.id)) {
    if (edge.relationType !== 'CONDITIONAL_ON' || edge.spanCount === 0) continue;
    const node = snapshot.getNode(edge.fromNode);
    if (node) indicators.push({ node, edge });
  }

  const planNodeIds = new Set(steps.map((step) => step.node.id));
  planNodeIds.add(goalNode.id);
  const risks: RiskDraft[] = [];
  for (const edge of snapshot.edges) {
    if (!isRiskEdge(edge) || edge.spanCount === 0) continue;
    if (!planNodeIds.has(edge.fromNode) && !planNodeIds.has(edge.toNode)) continue;
    const from = snapshot.getNode(edge.fromNode);
    const to = snapshot.getNode(edge.toNode);
    if (from && to) risks.push({ edge, from, to });
  }

  return { goal: request.goal, goalNode, steps, indicators, risks };
}

/** Every edge the finished plan may cite. */
export function citedEdgeIds(draft: InterventionDraft): Set<string> {
  const ids = new Set<string>();
  for (const step of draft.steps) {
    if (step.kind !== 'edge') continue;
    if (isEvidenced(step.edge)) ids.add(step.edge.id);
    for (const impact of step.impacts) {
      if (isEvidenced(impact)) ids.add(impact.id);
    }
  }
  for (const indicator of draft.indicators) ids.add(indicator.edge.id);
  for (const risk of draft.risks) ids.add(risk.edge.id);
  return ids;
}

// ============================================================================
// FINALIZATION
// ============================================================================

function goalNotFoundPlan(goal: string): InterventionPlan {
  return {
    goal,
    goalFound: false,
    goalNodeRef: null,
    steps: [],
    leadingIndicators: [{ indicator: GOAL_NOT_FOUND, source: NOT_SPECIFIED, evidence: [] }],
    riskOfImbalance: [],
  };
}

/**
 * Attach evidence to a draft. Edges without spans are never cited; their
 * step reason reads "not specified".
 */
export function finalizeInterventionPlan(
  draft: InterventionDraft,
  snapshot: MechanismGraphSnapshot,
  spans: ReadonlyMap<string, EvidenceSpan[]>,
): InterventionPlan {
  if (!draft.goalNode) return goalNotFoundPlan(draft.goal);

  const spansOf = (edge: MechanismEdge | null): EvidenceSpan[] =>
    isEvidenced(edge) ? spans.get(edge.id) ?? [] : [];

  const steps: InterventionStep[] = draft.steps.map((step) => {
    const citations = step.kind === 'edge' ? spansOf(step.edge).slice(0, CITATIONS_PER_EDGE) : step.spans;
    const impacts = step.kind === 'edge' ? step.impacts : [];
    return {
      targetNodeRefKind: step.node.refKind,
      targetNodeRefId: step.node.refId,
      targetNodeLabel: step.node.label,
      mechanismReason: citations[0]?.quote ?? NOT_SPECIFIED,
      mechanismCitations: citations,
      expectedImpacts: impacts.map((edge) => snapshot.labelOf(edge.toNode)),
      impactCitations: impacts.flatMap((edge) => spansOf(edge).slice(0, 1)),
    };
  });

  const leadingIndicators: LeadingIndicator[] = draft.indicators.map(({ node, edge }) => ({
    indicator: node.label,
    source: 'framework',
    evidence: spansOf(edge).slice(0, 1),
  }));
  if (leadingIndicators.length === 0) {
    leadingIndicators.push({ indicator: NOT_SPECIFIED, source: NOT_SPECIFIED, evidence: [] });
  }

  const riskOfImbalance: ImbalanceRisk[] = draft.risks.map(({ edge, from, to }) => ({
    risk: `${edge.relationType}: ${from.label} → ${to.label}`,
    relationType: edge.relationType,
    affectedPillar: to.refKind === 'pillar' ? to.refId : from.refKind === 'pillar' ? from.refId : null,
    evidence: spansOf(edge).slice(0, CITATIONS_PER_EDGE),
  }));

  return {
    goal: draft.goal,
    goalFound: true,
    goalNodeRef: formatNodeRef(draft.goalNode.refKind, draft.goalNode.refId),
    steps,
    leadingIndicators,
    riskOfImbalance,
  };
}

/**
 * Compute an evidence-bound intervention plan for a goal.
 *
 * An unknown goal is not an error: the plan comes back with `goalFound`
 * false, no steps and a single placeholder indicator.
 */
export async function computeInterventionPlan(
  loader: GraphLoader,
  request: InterventionRequest,
  config: PlannerConfig = DEFAULT_WORLD_MODEL_CONFIG.planner,
): Promise<GraphResult<InterventionPlan>> {
  const snapshotResult = await loader.loadSnapshot();
  if (!snapshotResult.ok) return snapshotResult;
  const snapshot = snapshotResult.value;

  const draft = draftInterventionPlan(snapshot, request, config);
  if (!draft.goalNode) return Ok(goalNotFoundPlan(request.goal));

  const spansResult = await loader.loadSpans(citedEdgeIds(draft));
  if (!spansResult.ok) return spansResult;

  return Ok(finalizeInterventionPlan(draft, snapshot, spansResult.value));
}

// ============================================================================
// VALIDATION
// ============================================================================

function stepIssues(step: InterventionStep, index: number): string[] {
  const issues: string[] = [];
  const n = index + 1;
  if (!validateNoMedicalClaims(step.targetNodeLabel)) {
    issues.push(`Step ${n} target contains forbidden medical claim`);
  }
  if (!validateNoMedicalClaims(step.mechanismReason)) {
    issues.push(`Step ${n} reason contains forbidden medical claim`);
  }
  if (!step.targetNodeRefKind || !step.targetNodeRefId.trim()) {
    issues.push(`Step ${n} missing framework node mapping`);
  }
  return issues;
}

/**
 * Re-check a plan against the claims gate and the anchor rule. Returns one
 * string per violation; an empty list means the plan is valid. Advisory only:
 * the plan is not modified.
 */
export function validateInterventionPlan(plan: InterventionPlan): string[] {
  const issues: string[] = [];
  if (!validateNoMedicalClaims(plan.goal)) {
    issues.push('Goal contains forbidden medical claim');
  }
  plan.steps.forEach((step, index) => {
    issues.push(...stepIssues(step, index));
  });
  return issues;
}

/** Steps of a plan that raise no validation issue. */
export function acceptedSteps(plan: InterventionPlan): InterventionStep[] {
  return plan.steps.filter((step, index) => stepIssues(step, index).length === 0);
}
