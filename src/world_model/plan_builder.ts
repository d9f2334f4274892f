/**
 * @fileoverview Selection of loops, interventions and simulations for one answer
 *
 * The builder picks the loops that touch the most detected pillars, keeps the
 * leading intervention plans and at most one simulation, and records every
 * loop edge it relies on as a `UsedEdge` so downstream citation can point at
 * the exact spans.
 */

import { DEFAULT_WORLD_MODEL_CONFIG } from '../config/world_model_config.js';
import type { PlanBuilderConfig } from '../config/world_model_config.js';
import { formatNodeRef, parseNodeRef } from './types.js';
import type {
  DetectedLoop,
  InterventionPlan,
  NodeRef,
  PlanRequirementCheck,
  SimulationResult,
  UsedEdge,
  WorldModelPlan,
} from './types.js';

export interface WorldModelPlanInput {
  /** Loops in ranked order; ties in pillar coverage keep this order. */
  loops: readonly DetectedLoop[];
  interventions: readonly InterventionPlan[];
  simulations: readonly SimulationResult[];
  detectedPillars: readonly string[];
  targetLoopCount?: number;
  targetInterventionCount?: number;
}

/** Number of framework pillars a full synthesis should cover. */
export const PILLAR_COUNT = 5;

/** Loops a synthesis needs before it counts as grounded in loops. */
export const MIN_PLAN_LOOPS = 2;

const JUSTIFICATION_SPANS_PER_EDGE = 2;

function detectedPillarsTouched(loop: DetectedLoop, pillarRefs: ReadonlySet<NodeRef>): number {
  let touched = 0;
  for (const ref of pillarRefs) {
    if (loop.nodes.includes(ref)) touched++;
  }
  return touched;
}

function usedEdgesOf(loop: DetectedLoop): UsedEdge[] {
  const count = loop.nodes.length;
  return loop.edgeIds.map((edgeId, index) => ({
    loopId: loop.loopId,
    edgeId,
    fromNode: loop.nodes[index],
    toNode: loop.nodes[(index + 1) % count],
    relationType: loop.relationTypes[index],
    justificationSpans: loop.evidenceSpans
      .filter((span) => span.edgeId === edgeId)
      .slice(0, JUSTIFICATION_SPANS_PER_EDGE),
  }));
}

export function buildWorldModelPlan(
  input: WorldModelPlanInput,
  config: PlanBuilderConfig = DEFAULT_WORLD_MODEL_CONFIG.planBuilder,
): WorldModelPlan {
  const targetLoopCount = input.targetLoopCount ?? config.targetLoopCount;
  const targetInterventionCount = input.targetInterventionCount ?? config.targetInterventionCount;
  const pillarRefs = new Set(input.detectedPillars.map((id) => formatNodeRef('pillar', id)));

  const loops = input.loops
    .map((loop) => ({ loop, touched: detectedPillarsTouched(loop, pillarRefs) }))
    .sort((a, b) => b.touched - a.touched)
    .slice(0, Math.max(0, targetLoopCount))
    .map(({ loop }) => loop);

  const covered = new Set<string>();
  const usedEdges: UsedEdge[] = [];
  for (const loop of loops) {
    for (const ref of loop.nodes) {
      const parsed = parseNodeRef(ref);
      if (parsed?.refKind === 'pillar') covered.add(parsed.refId);
    }
    usedEdges.push(...usedEdgesOf(loop));
  }

  const interventions = input.interventions.slice(0, Math.max(0, targetInterventionCount));
  for (const intervention of interventions) {
    for (const step of intervention.steps) {
      if (step.targetNodeRefKind === 'pillar') covered.add(step.targetNodeRefId);
    }
  }

  return {
    loops,
    interventions,
    simulations: input.simulations.slice(0, 1),
    coveredPillars: [...covered].sort(),
    usedEdges,
  };
}

/**
 * Loops and an intervention are required; full pillar coverage and loop
 * evidence are reported but do not fail the check.
 */
export function checkWorldModelPlanRequirements(plan: WorldModelPlan): PlanRequirementCheck {
  const issues: string[] = [];

  if (plan.loops.length < MIN_PLAN_LOOPS) {
    issues.push(`INSUFFICIENT_LOOPS: ${plan.loops.length}/${MIN_PLAN_LOOPS}`);
  }
  if (plan.interventions.length < 1) {
    issues.push('MISSING_INTERVENTION_PLAN');
  }
  if (plan.coveredPillars.length < PILLAR_COUNT) {
    issues.push(`INCOMPLETE_PILLAR_COVERAGE: ${plan.coveredPillars.length}/${PILLAR_COUNT}`);
  }
  if (!plan.loops.some((loop) => loop.evidenceSpans.length > 0)) {
    issues.push('NO_GROUNDED_EVIDENCE');
  }

  return {
    meets: plan.loops.length >= MIN_PLAN_LOOPS && plan.interventions.length >= 1,
    issues,
  };
}
