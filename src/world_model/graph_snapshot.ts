/**
 * @fileoverview Immutable in-memory view of the mechanism graph
 *
 * A snapshot is built once per top-level operation and never mutated, so
 * concurrent callers cannot observe each other's state. Node ids and
 * adjacency lists are kept sorted to make every traversal deterministic.
 */

import { formatNodeRef } from './types.js';
import type { MechanismEdge, MechanismNode } from './types.js';

const byId = <T extends { id: string }>(a: T, b: T): number => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

const EMPTY_EDGES: readonly MechanismEdge[] = [];

export class MechanismGraphSnapshot {
  readonly nodeIds: readonly string[];
  readonly edges: readonly MechanismEdge[];
  /** Edges dropped because an endpoint is not a loaded node. */
  readonly danglingEdgeCount: number;
  private readonly nodesById: ReadonlyMap<string, MechanismNode>;
  private readonly nodesByRef: ReadonlyMap<string, MechanismNode>;
  private readonly incoming: ReadonlyMap<string, readonly MechanismEdge[]>;
  private readonly outgoing: ReadonlyMap<string, readonly MechanismEdge[]>;

  private constructor(nodes: MechanismNode[], edges: MechanismEdge[]) {
    const sortedNodes = [...nodes].sort(byId);
    const nodesById = new Map<string, MechanismNode>();
    const nodesByRef = new Map<string, MechanismNode>();
    for (const node of sortedNodes) {
      nodesById.set(node.id, node);
      nodesByRef.set(formatNodeRef(node.refKind, node.refId), node);
    }

    const kept: MechanismEdge[] = [];
    const incoming = new Map<string, MechanismEdge[]>();
    const outgoing = new Map<string, MechanismEdge[]>();
    for (const edge of [...edges].sort(byId)) {
      if (!nodesById.has(edge.fromNode) || !nodesById.has(edge.toNode)) continue;
      kept.push(edge);
      const out = outgoing.get(edge.fromNode) ?? [];
      out.push(edge);
      outgoing.set(edge.fromNode, out);
      const inc = incoming.get(edge.toNode) ?? [];
      inc.push(edge);
      incoming.set(edge.toNode, inc);
    }

    this.nodeIds = sortedNodes.map((node) => node.id);
    this.edges = kept;
    this.danglingEdgeCount = edges.length - kept.length;
    this.nodesById = nodesById;
    this.nodesByRef = nodesByRef;
    this.incoming = incoming;
    this.outgoing = outgoing;
  }

  static fromRecords(nodes: MechanismNode[], edges: MechanismEdge[]): MechanismGraphSnapshot {
    return new MechanismGraphSnapshot(nodes, edges);
  }

  get nodeCount(): number {
    return this.nodeIds.length;
  }

  get isEmpty(): boolean {
    return this.nodeIds.length === 0;
  }

  getNode(id: string): MechanismNode | undefined {
    return this.nodesById.get(id);
  }

  /** Lookup by `kind:refId`. */
  getNodeByRef(ref: string): MechanismNode | undefined {
    return this.nodesByRef.get(ref);
  }

  labelOf(nodeId: string): string {
    return this.nodesById.get(nodeId)?.label ?? nodeId;
  }

  /** Incoming edges sorted by edge id. */
  getIncoming(nodeId: string): readonly MechanismEdge[] {
    return this.incoming.get(nodeId) ?? EMPTY_EDGES;
  }

  /** Outgoing edges sorted by edge id. */
  getOutgoing(nodeId: string): readonly MechanismEdge[] {
    return this.outgoing.get(nodeId) ?? EMPTY_EDGES;
  }
}
