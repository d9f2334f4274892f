/**
 * @fileoverview In-process graph fixtures for world model tests
 */

import { getDefaultPolarity } from '../polarity.js';
import type { MechanismEdgeInput, StoreWriteResult, WorldModelStore } from '../../storage/types.js';
import type {
  DetectedLoop,
  EvidenceSpan,
  FrameworkEntity,
  FrameworkRefKind,
  MechanismEdge,
  MechanismGraphStats,
  MechanismNode,
  PersistedLoop,
  Polarity,
  RefKind,
  RelationType,
} from '../types.js';

export function makeNode(id: string, refKind: RefKind, refId: string, label: string = refId): MechanismNode {
  return { id, refKind, refId, label };
}

export function makeEdge(
  id: string,
  fromNode: string,
  toNode: string,
  relationType: RelationType = 'ENABLES',
  overrides: Partial<MechanismEdge> = {},
): MechanismEdge {
  return {
    id,
    fromNode,
    toNode,
    relationType,
    polarity: getDefaultPolarity(relationType),
    confidence: 0.5,
    spanCount: 1,
    chunkDiversity: 1,
    spans: [],
    ...overrides,
  };
}

export function makeSpan(edgeId: string, quote: string, chunkId: string = 'chunk-1', spanStart: number = 0): EvidenceSpan {
  return { edgeId, chunkId, spanStart, spanEnd: spanStart + quote.length, quote };
}

export interface InMemoryGraph {
  nodes: MechanismNode[];
  edges: MechanismEdge[];
  spans?: EvidenceSpan[];
  loops?: PersistedLoop[];
}

type StoreMethod = keyof WorldModelStore;

/**
 * WorldModelStore over plain arrays. Edge aggregates are derived from the
 * span list the way the SQLite store derives them. Any method can be made to
 * fail with {@link failOn}.
 */
export class InMemoryWorldModelStore implements WorldModelStore {
  nodes: MechanismNode[];
  edges: MechanismEdge[];
  spans: EvidenceSpan[];
  loops: PersistedLoop[];
  /** Edge-id sets passed to loadSpans, in call order. */
  readonly spanRequests: string[][] = [];
  readonly calls: StoreMethod[] = [];
  private readonly failures = new Map<StoreMethod, Error>();

  constructor(graph: InMemoryGraph) {
    this.nodes = [...graph.nodes];
    this.edges = [...graph.edges];
    this.spans = [...(graph.spans ?? [])];
    this.loops = [...(graph.loops ?? [])];
  }

  failOn(method: StoreMethod, error: Error = new Error(`${method} unavailable`)): void {
    this.failures.set(method, error);
  }

  async initialize(): Promise<void> {
    this.track('initialize');
  }

  async close(): Promise<void> {
    this.track('close');
  }

  isInitialized(): boolean {
    return true;
  }

  async upsertFrameworkEntities(entities: readonly FrameworkEntity[]): Promise<StoreWriteResult> {
    this.track('upsertFrameworkEntities');
    return { written: entities.length, skipped: 0 };
  }

  async listFrameworkEntities(_kind?: FrameworkRefKind): Promise<FrameworkEntity[]> {
    this.track('listFrameworkEntities');
    return [];
  }

  async loadNodes(): Promise<MechanismNode[]> {
    this.track('loadNodes');
    return [...this.nodes];
  }

  async loadNodesByIds(ids: readonly string[]): Promise<MechanismNode[]> {
    this.track('loadNodesByIds');
    return this.nodes.filter((node) => ids.includes(node.id));
  }

  async loadEdges(): Promise<MechanismEdge[]> {
    this.track('loadEdges');
    return this.edges.map((edge) => this.withAggregates(edge));
  }

  async loadEdgesByIds(ids: readonly string[]): Promise<MechanismEdge[]> {
    this.track('loadEdgesByIds');
    return this.edges.filter((edge) => ids.includes(edge.id)).map((edge) => this.withAggregates(edge));
  }

  async loadSpans(edgeIds: ReadonlySet<string>): Promise<Map<string, EvidenceSpan[]>> {
    this.track('loadSpans');
    this.spanRequests.push([...edgeIds].sort());
    const result = new Map<string, EvidenceSpan[]>();
    for (const span of this.spans) {
      if (!edgeIds.has(span.edgeId)) continue;
      const list = result.get(span.edgeId) ?? [];
      list.push(span);
      result.set(span.edgeId, list);
    }
    return result;
  }

  async loadPersistedLoops(limit?: number): Promise<PersistedLoop[]> {
    this.track('loadPersistedLoops');
    return this.loops.slice(0, limit ?? this.loops.length);
  }

  async countGraphStats(): Promise<MechanismGraphStats> {
    this.track('countGraphStats');
    const edges = this.edges.map((edge) => this.withAggregates(edge));
    return {
      totalNodes: this.nodes.length,
      totalEdges: edges.length,
      edgesByPillar: {},
      edgesByRelation: {},
      edgesWithSpans: edges.filter((edge) => edge.spanCount > 0).length,
      avgConfidence: 0,
      loopsCount: this.loops.length,
    };
  }

  async upsertNodes(nodes: readonly MechanismNode[]): Promise<StoreWriteResult> {
    this.track('upsertNodes');
    this.nodes.push(...nodes);
    return { written: nodes.length, skipped: 0 };
  }

  async upsertEdges(edges: readonly MechanismEdgeInput[]): Promise<StoreWriteResult> {
    this.track('upsertEdges');
    return { written: edges.length, skipped: 0 };
  }

  async insertSpans(spans: readonly EvidenceSpan[]): Promise<StoreWriteResult> {
    this.track('insertSpans');
    this.spans.push(...spans);
    return { written: spans.length, skipped: 0 };
  }

  async persistLoops(loops: readonly PersistedLoop[]): Promise<StoreWriteResult> {
    this.track('persistLoops');
    const known = new Set(this.loops.map((loop) => loop.loopId));
    const fresh = loops.filter((loop) => !known.has(loop.loopId));
    this.loops.push(...fresh);
    return { written: fresh.length, skipped: loops.length - fresh.length };
  }

  private track(method: StoreMethod): void {
    this.calls.push(method);
    const failure = this.failures.get(method);
    if (failure) throw failure;
  }

  private withAggregates(edge: MechanismEdge): MechanismEdge {
    const spans = this.spans.filter((span) => span.edgeId === edge.id);
    return {
      ...edge,
      spanCount: spans.length,
      chunkDiversity: new Set(spans.map((span) => span.chunkId)).size,
      spans: [],
    };
  }
}

export function makeLoop(
  loopId: string,
  nodeRefs: DetectedLoop['nodes'],
  overrides: Partial<DetectedLoop> = {},
): DetectedLoop {
  const edgeIds = nodeRefs.map((_, index) => `${loopId}-e${index + 1}`);
  return {
    loopId,
    loopType: 'reinforcing',
    edgeIds,
    nodes: nodeRefs,
    nodeLabels: nodeRefs.map((ref) => ref.slice(ref.indexOf(':') + 1)),
    polarities: nodeRefs.map((): Polarity => 1),
    relationTypes: nodeRefs.map((): RelationType => 'ENABLES'),
    evidenceSpans: [],
    ...overrides,
  };
}

/**
 * Five mechanism nodes a..e with a 2-edge loop (ab, ba), a 3-edge loop
 * (cd, de, ec) and a 5-edge loop (ab, bc, cd, de, ea), every edge evidenced.
 */
export async function seedMixedLoopGraph(store: WorldModelStore): Promise<void> {
  await store.upsertNodes(['a', 'b', 'c', 'd', 'e'].map((id, index) => makeNode(id, 'mechanism', `M${index + 1}`)));
  const links = ['ab', 'ba', 'bc', 'cd', 'de', 'ea', 'ec'];
  await store.upsertEdges(links.map((id): MechanismEdgeInput => ({ id, fromNode: id[0], toNode: id[1], relationType: 'ENABLES' })));
  await store.insertSpans(links.map((id, index) => makeSpan(id, `${id[0]} leads to ${id[1]}`, `chunk-${index + 1}`)));
}
