/**
 * @fileoverview Mechanism graph and world model result types
 *
 * The mechanism graph is a causal overlay on the wellbeing framework
 * (pillar → core value → sub-value). Nodes anchor to framework entities or
 * are abstract mechanisms/outcomes; edges carry a typed, signed relation
 * backed by evidence spans quoted from the framework corpus.
 */

// ============================================================================
// ENUMERATIONS
// ============================================================================

export const FRAMEWORK_REF_KINDS = ['pillar', 'core_value', 'sub_value'] as const;
export type FrameworkRefKind = typeof FRAMEWORK_REF_KINDS[number];

export const REF_KINDS = [...FRAMEWORK_REF_KINDS, 'mechanism', 'outcome'] as const;
export type RefKind = typeof REF_KINDS[number];

export const RELATION_TYPES = [
  'ENABLES',
  'REINFORCES',
  'COMPLEMENTS',
  'CONDITIONAL_ON',
  'INHIBITS',
  'TENSION_WITH',
  'RESOLVES_WITH',
] as const;
export type RelationType = typeof RELATION_TYPES[number];

/** Relations that can describe an imbalance between framework parts. */
export type RiskRelationType = Extract<RelationType, 'INHIBITS' | 'TENSION_WITH'>;

export type Polarity = 1 | -1;

export type LoopType = 'reinforcing' | 'balancing';

export const NOT_SPECIFIED = 'not specified';

export function isRefKind(value: string): value is RefKind {
  return (REF_KINDS as readonly string[]).includes(value);
}

export function isFrameworkRefKind(value: string): value is FrameworkRefKind {
  return (FRAMEWORK_REF_KINDS as readonly string[]).includes(value);
}

export function isRelationType(value: string): value is RelationType {
  return (RELATION_TYPES as readonly string[]).includes(value);
}

// ============================================================================
// GRAPH RECORDS
// ============================================================================

/** A node of the static framework ontology that mechanism nodes anchor to. */
export interface FrameworkEntity {
  kind: FrameworkRefKind;
  id: string;
  label: string;
  parentId?: string | null;
}

export interface MechanismNode {
  id: string;
  refKind: RefKind;
  refId: string;
  label: string;
  /** Corpus chunk the node was mined from, when known. */
  sourceId?: string | null;
}

export interface EvidenceSpan {
  edgeId: string;
  chunkId: string;
  spanStart: number;
  spanEnd: number;
  quote: string;
}

/**
 * A causal edge. Topology loads fill `spanCount` and `chunkDiversity` from
 * aggregates and leave `spans` empty; span bodies are hydrated separately.
 */
export interface MechanismEdge {
  id: string;
  fromNode: string;
  toNode: string;
  relationType: RelationType;
  polarity: Polarity;
  confidence: number;
  spanCount: number;
  chunkDiversity: number;
  spans: EvidenceSpan[];
  /** Set when the polarity departs from the relation default on evidence. */
  polarityOverridden?: boolean;
}

/** `kind:refId` reference to a mechanism node, as used in loops and queries. */
export type NodeRef = `${string}:${string}`;

export interface EntityRef {
  refKind: string;
  refId: string;
}

export function formatNodeRef(refKind: string, refId: string): NodeRef {
  return `${refKind}:${refId}`;
}

export function parseNodeRef(ref: string): EntityRef | null {
  const separator = ref.indexOf(':');
  if (separator <= 0 || separator === ref.length - 1) return null;
  return { refKind: ref.slice(0, separator), refId: ref.slice(separator + 1) };
}

// ============================================================================
// LOOPS
// ============================================================================

export interface DetectedLoop {
  loopId: string;
  loopType: LoopType;
  edgeIds: string[];
  /** From-node of each edge in traversal order, as `kind:refId`. */
  nodes: NodeRef[];
  nodeLabels: string[];
  polarities: Polarity[];
  relationTypes: RelationType[];
  /** Up to two spans per edge, in edge order. */
  evidenceSpans: EvidenceSpan[];
}

/** Storage shape of a mined loop; everything else is re-resolved on load. */
export interface PersistedLoop {
  loopId: string;
  loopType: LoopType;
  edgeIds: string[];
}

// ============================================================================
// INTERVENTIONS
// ============================================================================

export interface InterventionStep {
  targetNodeRefKind: RefKind;
  targetNodeRefId: string;
  targetNodeLabel: string;
  /** First evidence quote of the connecting edge, or {@link NOT_SPECIFIED}. */
  mechanismReason: string;
  mechanismCitations: EvidenceSpan[];
  expectedImpacts: string[];
  impactCitations: EvidenceSpan[];
}

export type IndicatorSource = 'framework' | typeof NOT_SPECIFIED;

export interface LeadingIndicator {
  indicator: string;
  source: IndicatorSource;
  evidence: EvidenceSpan[];
}

export interface ImbalanceRisk {
  risk: string;
  relationType: RiskRelationType;
  affectedPillar: string | null;
  evidence: EvidenceSpan[];
}

export interface InterventionPlan {
  goal: string;
  goalFound: boolean;
  goalNodeRef: NodeRef | null;
  /** Farthest leverage point first, goal last. */
  steps: InterventionStep[];
  leadingIndicators: LeadingIndicator[];
  riskOfImbalance: ImbalanceRisk[];
}

// ============================================================================
// SIMULATION
// ============================================================================

export interface PropagationStep {
  step: number;
  nodeId: string;
  nodeLabel: string;
  delta: number;
  newValue: number;
  viaEdgeIds: string[];
  viaRelations: RelationType[];
}

export interface SimulationResult {
  changedNodeId: string | null;
  magnitude: number;
  initialState: Record<string, number>;
  /** Only nodes whose value moved beyond the delta threshold. */
  finalState: Record<string, number>;
  propagationSteps: PropagationStep[];
  label: string;
}

export interface WhatIfPillarResult {
  pillarId: string;
  magnitude: number;
  finalState: Record<string, number>;
  propagationSteps: PropagationStep[];
}

export interface WhatIfResult {
  scenario: string;
  results: WhatIfPillarResult[];
  /** Highest final value reached per node across all pillar changes. */
  combinedImpacts: Record<string, number>;
  label: string;
}

// ============================================================================
// STATS AND PLANS
// ============================================================================

export interface MechanismGraphStats {
  totalNodes: number;
  totalEdges: number;
  edgesByPillar: Record<string, number>;
  edgesByRelation: Partial<Record<RelationType, number>>;
  edgesWithSpans: number;
  avgConfidence: number;
  loopsCount: number;
}

export interface UsedEdge {
  loopId: string;
  edgeId: string;
  fromNode: NodeRef;
  toNode: NodeRef;
  relationType: RelationType;
  justificationSpans: EvidenceSpan[];
}

export interface WorldModelPlan {
  loops: DetectedLoop[];
  interventions: InterventionPlan[];
  simulations: SimulationResult[];
  coveredPillars: string[];
  usedEdges: UsedEdge[];
}

export interface PlanRequirementCheck {
  meets: boolean;
  issues: string[];
}
