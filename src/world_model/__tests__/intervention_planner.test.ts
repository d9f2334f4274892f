import { describe, it, expect, beforeEach } from 'vitest';
import { GraphLoader } from '../graph_loader.js';
import { MechanismGraphSnapshot } from '../graph_snapshot.js';
import {
  GOAL_NOT_FOUND,
  acceptedSteps,
  computeInterventionPlan,
  draftInterventionPlan,
  resolveGoalNode,
  traceLeveragePoints,
  validateInterventionPlan,
} from '../intervention_planner.js';
import type { InterventionPlan, InterventionStep } from '../types.js';
import { InMemoryWorldModelStore, makeEdge, makeLoop, makeNode, makeSpan } from './fixtures.js';

// Trust -> Gratitude -> Patience (goal)
// Disorder of habits -> Gratitude   dropped by the claims gate
// Trust -> Calm                     impact of the Trust step
// Morning routine -> Patience       CONDITIONAL_ON, leading indicator
// Haste -> Patience                 TENSION_WITH, imbalance risk
const nodes = [
  makeNode('n1', 'pillar', 'P1', 'Patience'),
  makeNode('n2', 'core_value', 'CV1', 'Gratitude'),
  makeNode('n3', 'mechanism', 'M1', 'Trust'),
  makeNode('n4', 'mechanism', 'M2', 'Disorder of habits'),
  makeNode('n5', 'outcome', 'O1', 'Calm'),
  makeNode('n6', 'mechanism', 'M3', 'Morning routine'),
  makeNode('n7', 'pillar', 'P2', 'Haste'),
];

const edges = [
  makeEdge('e1', 'n2', 'n1', 'ENABLES'),
  makeEdge('e2', 'n3', 'n2', 'REINFORCES'),
  makeEdge('e3', 'n4', 'n2', 'ENABLES'),
  makeEdge('e4', 'n3', 'n5', 'ENABLES'),
  makeEdge('e5', 'n6', 'n1', 'CONDITIONAL_ON'),
  makeEdge('e6', 'n7', 'n1', 'TENSION_WITH'),
];

const e1First = makeSpan('e1', 'Gratitude grows patience', 'c1');
const e1Second = makeSpan('e1', 'The grateful wait well', 'c2');
const e1Third = makeSpan('e1', 'A third account of the same link', 'c3');
const e2Span = makeSpan('e2', 'Trust deepens gratitude', 'c1');
const e3Span = makeSpan('e3', 'Habits shape gratitude', 'c1');
const e4Span = makeSpan('e4', 'Trust brings calm', 'c2');
const e5Span = makeSpan('e5', 'A morning routine precedes patience', 'c3');
const e6Span = makeSpan('e6', 'Haste strains patience', 'c4');

const spans = [e1First, e1Second, e1Third, e2Span, e3Span, e4Span, e5Span, e6Span];

const snapshot = MechanismGraphSnapshot.fromRecords(nodes, edges);

describe('resolveGoalNode', () => {
  it('prefers a detected entity over the goal text', () => {
    expect(resolveGoalNode(snapshot, 'patience', [{ refKind: 'core_value', refId: 'CV1' }])?.id).toBe('n2');
  });

  it('matches folded labels in either direction', () => {
    expect(resolveGoalNode(snapshot, 'PATIENCE')?.id).toBe('n1');
    expect(resolveGoalNode(snapshot, 'build steadfast patience over time')?.id).toBe('n1');
    expect(resolveGoalNode(snapshot, 'routine')?.id).toBe('n6');
  });

  it('falls back to the goal text when entities do not resolve', () => {
    expect(resolveGoalNode(snapshot, 'calm', [{ refKind: 'pillar', refId: 'P9' }])?.id).toBe('n5');
  });

  it('never matches an empty or unknown goal', () => {
    expect(resolveGoalNode(snapshot, '   ')).toBeNull();
    expect(resolveGoalNode(snapshot, 'serenity')).toBeNull();
  });
});

describe('traceLeveragePoints', () => {
  it('walks incoming edges breadth first and records each node once', () => {
    const goal = snapshot.getNode('n1');
    expect(goal).toBeDefined();
    if (!goal) return;

    const points = traceLeveragePoints(snapshot, goal, 4).map((point) => [point.node.id, point.edge.id, point.depth]);
    expect(points).toEqual([
      ['n2', 'e1', 1],
      ['n6', 'e5', 1],
      ['n7', 'e6', 1],
      ['n3', 'e2', 2],
      ['n4', 'e3', 2],
    ]);
  });

  it('honours the depth limit', () => {
    const goal = snapshot.getNode('n1');
    if (!goal) throw new Error('fixture goal missing');
    expect(traceLeveragePoints(snapshot, goal, 1).map((point) => point.node.id)).toEqual(['n2', 'n6', 'n7']);
  });
});

describe('draftInterventionPlan', () => {
  it('orders steps farthest first, ends at the goal and drops medical labels', () => {
    const draft = draftInterventionPlan(snapshot, { goal: 'patience' });
    expect(draft.steps.map((step) => step.node.label)).toEqual([
      'Trust',
      'Gratitude',
      'Morning routine',
      'Haste',
      'Patience',
    ]);
  });

  it('keeps maxSteps - 1 leverage points before the goal', () => {
    const draft = draftInterventionPlan(snapshot, { goal: 'patience', maxSteps: 3 });
    expect(draft.steps.map((step) => step.node.id)).toEqual(['n3', 'n2', 'n1']);
  });

  it('backfills a short plan from loops through the goal', () => {
    const loop = makeLoop('L', ['mechanism:M1', 'outcome:O1', 'core_value:CV1'], {
      evidenceSpans: [makeSpan('L-e1', 'Trust settles the heart'), makeSpan('L-e3', 'Gratitude steadies calm')],
    });

    const plain = draftInterventionPlan(snapshot, { goal: 'calm' });
    expect(plain.steps.map((step) => step.node.label)).toEqual(['Trust', 'Calm']);

    const backfilled = draftInterventionPlan(snapshot, { goal: 'calm', loops: [loop] });
    expect(backfilled.steps.map((step) => step.node.label)).toEqual(['Trust', 'Gratitude', 'Calm']);
    const [, filler] = backfilled.steps;
    expect(filler.kind).toBe('loop');
  });

  it('fills a short plan from loops up to the step budget', () => {
    const isolated = MechanismGraphSnapshot.fromRecords([
      makeNode('g', 'outcome', 'O9', 'Steadiness'),
      makeNode('x1', 'mechanism', 'X1', 'Rest'),
      makeNode('x2', 'mechanism', 'X2', 'Reflection'),
      makeNode('x3', 'mechanism', 'X3', 'Walking'),
      makeNode('x4', 'mechanism', 'X4', 'Reading'),
    ], []);
    const loop = makeLoop('wide', ['outcome:O9', 'mechanism:X1', 'mechanism:X2', 'mechanism:X3', 'mechanism:X4']);
    const request = { goal: 'steadiness', detectedEntities: [{ refKind: 'outcome' as const, refId: 'O9' }], loops: [loop] };

    const full = draftInterventionPlan(isolated, request);
    expect(full.steps.map((step) => step.node.label)).toEqual(['Rest', 'Reflection', 'Walking', 'Reading', 'Steadiness']);

    const capped = draftInterventionPlan(isolated, { ...request, maxSteps: 4 });
    expect(capped.steps.map((step) => step.node.label)).toEqual(['Rest', 'Reflection', 'Walking', 'Steadiness']);
  });

  it('ignores loops that do not pass through the goal', () => {
    const elsewhere = makeLoop('far', ['pillar:P2', 'core_value:CV1']);
    const draft = draftInterventionPlan(snapshot, { goal: 'calm', loops: [elsewhere] });
    expect(draft.steps.map((step) => step.node.label)).toEqual(['Trust', 'Calm']);
  });

  it('omits a goal step whose label fails the claims gate', () => {
    const draft = draftInterventionPlan(snapshot, {
      goal: 'habits',
      detectedEntities: [{ refKind: 'mechanism', refId: 'M2' }],
    });
    expect(draft.goalNode?.id).toBe('n4');
    expect(draft.steps).toEqual([]);
  });
});

describe('computeInterventionPlan', () => {
  let store: InMemoryWorldModelStore;
  let loader: GraphLoader;

  beforeEach(() => {
    store = new InMemoryWorldModelStore({ nodes, edges, spans });
    loader = new GraphLoader(store);
  });

  it('binds every step, indicator and risk to evidence', async () => {
    const result = await computeInterventionPlan(loader, { goal: 'patience', maxSteps: 3 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const plan = result.value;

    expect(plan.goalFound).toBe(true);
    expect(plan.goalNodeRef).toBe('pillar:P1');
    expect(plan.steps).toEqual([
      {
        targetNodeRefKind: 'mechanism',
        targetNodeRefId: 'M1',
        targetNodeLabel: 'Trust',
        mechanismReason: 'Trust deepens gratitude',
        mechanismCitations: [e2Span],
        expectedImpacts: ['Gratitude', 'Calm'],
        impactCitations: [e2Span, e4Span],
      },
      {
        targetNodeRefKind: 'core_value',
        targetNodeRefId: 'CV1',
        targetNodeLabel: 'Gratitude',
        mechanismReason: 'Gratitude grows patience',
        mechanismCitations: [e1First, e1Second],
        expectedImpacts: ['Patience'],
        impactCitations: [e1First],
      },
      {
        targetNodeRefKind: 'pillar',
        targetNodeRefId: 'P1',
        targetNodeLabel: 'Patience',
        mechanismReason: 'Gratitude grows patience',
        mechanismCitations: [e1First, e1Second],
        expectedImpacts: [],
        impactCitations: [],
      },
    ]);
    expect(plan.leadingIndicators).toEqual([
      { indicator: 'Morning routine', source: 'framework', evidence: [e5Span] },
    ]);
    expect(plan.riskOfImbalance).toEqual([
      {
        risk: 'TENSION_WITH: Haste → Patience',
        relationType: 'TENSION_WITH',
        affectedPillar: 'P1',
        evidence: [e6Span],
      },
    ]);
  });

  it('loads spans once, only for cited edges', async () => {
    await computeInterventionPlan(loader, { goal: 'patience', maxSteps: 3 });
    expect(store.spanRequests).toEqual([['e1', 'e2', 'e4', 'e5', 'e6']]);
  });

  it('uses loop evidence for backfilled steps and a placeholder indicator', async () => {
    const loop = makeLoop('L', ['mechanism:M1', 'outcome:O1', 'core_value:CV1'], {
      evidenceSpans: [makeSpan('L-e3', 'Gratitude steadies calm')],
    });
    const result = await computeInterventionPlan(loader, { goal: 'calm', loops: [loop] });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.steps[1].mechanismReason).toBe('Gratitude steadies calm');
    expect(result.value.steps[1].expectedImpacts).toEqual([]);
    expect(result.value.leadingIndicators).toEqual([
      { indicator: 'not specified', source: 'not specified', evidence: [] },
    ]);
    expect(result.value.riskOfImbalance).toEqual([]);
  });

  it('does not cite edges without evidence', async () => {
    store.spans = store.spans.filter((span) => span.edgeId !== 'e2');
    const result = await computeInterventionPlan(loader, { goal: 'patience', maxSteps: 3 });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    const [trust] = result.value.steps;
    expect(trust.mechanismReason).toBe('not specified');
    expect(trust.mechanismCitations).toEqual([]);
    expect(trust.impactCitations).toEqual([e4Span]);
  });

  it('reports an unknown goal without loading spans', async () => {
    const result = await computeInterventionPlan(loader, { goal: 'serenity' });
    expect(result).toEqual({
      ok: true,
      value: {
        goal: 'serenity',
        goalFound: false,
        goalNodeRef: null,
        steps: [],
        leadingIndicators: [{ indicator: GOAL_NOT_FOUND, source: 'not specified', evidence: [] }],
        riskOfImbalance: [],
      },
    });
    expect(store.spanRequests).toEqual([]);
  });

  it('surfaces a failed load as an error result', async () => {
    store.failOn('loadSpans');
    const result = await computeInterventionPlan(loader, { goal: 'patience' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.source).toBe('spans');
  });
});

describe('validateInterventionPlan', () => {
  const step = (overrides: Partial<InterventionStep>): InterventionStep => ({
    targetNodeRefKind: 'mechanism',
    targetNodeRefId: 'M1',
    targetNodeLabel: 'Trust',
    mechanismReason: 'Trust deepens gratitude',
    mechanismCitations: [],
    expectedImpacts: [],
    impactCitations: [],
    ...overrides,
  });

  const plan = (goal: string, steps: InterventionStep[]): InterventionPlan => ({
    goal,
    goalFound: true,
    goalNodeRef: 'pillar:P1',
    steps,
    leadingIndicators: [],
    riskOfImbalance: [],
  });

  it('accepts a clean plan', () => {
    expect(validateInterventionPlan(plan('patience', [step({})]))).toEqual([]);
  });

  it('names the step that carries a forbidden term', () => {
    const issues = validateInterventionPlan(plan('patience', [
      step({}),
      step({ targetNodeLabel: 'Skip the medication' }),
    ]));
    expect(issues).toEqual(['Step 2 target contains forbidden medical claim']);
  });

  it('checks the goal, the reason and the node mapping', () => {
    const issues = validateInterventionPlan(plan('a diagnosis of mood', [
      step({ targetNodeRefId: '  ', mechanismReason: 'A cure for bipolar swings' }),
    ]));
    expect(issues).toEqual([
      'Goal contains forbidden medical claim',
      'Step 1 reason contains forbidden medical claim',
      'Step 1 missing framework node mapping',
    ]);
  });

  it('keeps only the steps without issues', () => {
    const clean = step({ targetNodeLabel: 'Gratitude' });
    const flagged = step({ targetNodeLabel: 'تشخيص' });
    expect(acceptedSteps(plan('patience', [flagged, clean]))).toEqual([clean]);
  });
});
