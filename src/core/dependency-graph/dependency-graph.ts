/**
 * Dependency Graph
 *
 * Immutable, directed, possibly cyclic graph of code entities. Holds forward
 * and reverse adjacency indices so traversals in either direction are O(degree).
 *
 * @module
 */

import { ErrorCode, GraphError } from "../errors.js";
import type {
  EdgeKind,
  GraphDiagnostic,
  GraphEdge,
  GraphNode,
  GraphStats,
  NodeKind,
  SerializedGraph,
} from "./types.js";

const NO_EDGES: readonly GraphEdge[] = Object.freeze([]);

/**
 * Orders edges by source, target, then kind.
 */
export function compareEdges(a: GraphEdge, b: GraphEdge): number {
  if (a.source !== b.source) return a.source < b.source ? -1 : 1;
  if (a.target !== b.target) return a.target < b.target ? -1 : 1;
  if (a.kind !== b.kind) return a.kind < b.kind ? -1 : 1;
  return 0;
}

export function edgeKey(edge: Pick<GraphEdge, "source" | "target" | "kind">): string {
  return `${edge.source}->${edge.target}:${edge.kind}`;
}

export class DependencyGraph {
  readonly nodes: ReadonlyMap<string, GraphNode>;
  readonly edges: readonly GraphEdge[];
  readonly diagnostics: readonly GraphDiagnostic[];

  private readonly forward = new Map<string, GraphEdge[]>();
  private readonly reverse = new Map<string, GraphEdge[]>();
  private readonly byName = new Map<string, string>();
  private readonly sortedIds: readonly string[];

  /**
   * @throws GraphError if an edge references a node that is not in `nodes`,
   * or two nodes share an id or qualified name
   */
  constructor(
    nodes: readonly GraphNode[],
    edges: readonly GraphEdge[],
    diagnostics: readonly GraphDiagnostic[] = []
  ) {
    const nodeMap = new Map<string, GraphNode>();
    for (const node of nodes) {
      if (nodeMap.has(node.id)) {
        throw new GraphError(`Duplicate node id ${node.id}`, ErrorCode.GRAPH_INVARIANT_VIOLATED, {
          nodeId: node.id,
        });
      }
      if (this.byName.has(node.qualifiedName)) {
        throw new GraphError(
          `Duplicate qualified name ${node.qualifiedName}`,
          ErrorCode.GRAPH_INVARIANT_VIOLATED,
          { nodeId: node.id }
        );
      }
      nodeMap.set(node.id, Object.freeze({ ...node }));
      this.byName.set(node.qualifiedName, node.id);
    }

    const sortedEdges = [...edges].sort(compareEdges);
    for (const edge of sortedEdges) {
      for (const endpoint of [edge.source, edge.target]) {
        if (!nodeMap.has(endpoint)) {
          throw new GraphError(
            `Edge ${edgeKey(edge)} references unknown node ${endpoint}`,
            ErrorCode.GRAPH_NODE_NOT_FOUND,
            { nodeId: endpoint }
          );
        }
      }
      const frozen = Object.freeze({ ...edge });
      appendTo(this.forward, edge.source, frozen);
      appendTo(this.reverse, edge.target, frozen);
    }

    this.nodes = nodeMap;
    this.edges = Object.freeze([...this.forward.values()].flat().sort(compareEdges));
    this.diagnostics = Object.freeze([...diagnostics]);
    this.sortedIds = Object.freeze([...nodeMap.keys()].sort());
  }

  static empty(): DependencyGraph {
    return new DependencyGraph([], []);
  }

  get size(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id);
  }

  getNode(id: string): GraphNode | undefined {
    return this.nodes.get(id);
  }

  getNodeByName(qualifiedName: string): GraphNode | undefined {
    const id = this.byName.get(qualifiedName);
    return id === undefined ? undefined : this.nodes.get(id);
  }

  /**
   * Node ids in stable (lexicographic) order.
   */
  nodeIds(): readonly string[] {
    return this.sortedIds;
  }

  /** Edges leaving `id`, i.e. what it depends on. */
  outgoing(id: string): readonly GraphEdge[] {
    return this.forward.get(id) ?? NO_EDGES;
  }

  /** Edges arriving at `id`, i.e. who depends on it. */
  incoming(id: string): readonly GraphEdge[] {
    return this.reverse.get(id) ?? NO_EDGES;
  }

  dependencies(id: string): string[] {
    return uniqueSorted(this.outgoing(id).map((edge) => edge.target));
  }

  dependents(id: string): string[] {
    return uniqueSorted(this.incoming(id).map((edge) => edge.source));
  }

  /**
   * Statistics about the graph
   */
  getStats(): GraphStats {
    const nodesByKind: Record<NodeKind, number> = {
      function: 0,
      type: 0,
      interface: 0,
      module: 0,
      external: 0,
    };
    const edgesByKind: Record<EdgeKind, number> = {
      calls: 0,
      contains: 0,
      implements: 0,
      dependsOn: 0,
    };
    let leafNodes = 0;
    let rootNodes = 0;

    for (const node of this.nodes.values()) {
      nodesByKind[node.kind]++;
      if (this.outgoing(node.id).length === 0) leafNodes++;
      if (this.incoming(node.id).length === 0) rootNodes++;
    }
    for (const edge of this.edges) {
      edgesByKind[edge.kind]++;
    }

    return {
      nodeCount: this.size,
      edgeCount: this.edgeCount,
      nodesByKind,
      edgesByKind,
      leafNodes,
      rootNodes,
      averageDegree: this.size === 0 ? 0 : (this.edgeCount * 2) / this.size,
      cycleCount: this.findCycles().length,
    };
  }

  /**
   * Find strongly connected components using Tarjan's algorithm.
   *
   * Returns components with more than one node plus single nodes with a
   * self-loop. Members of each component are sorted; components are ordered
   * by their first member.
   */
  findCycles(): string[][] {
    const index = new Map<string, number>();
    const lowlink = new Map<string, number>();
    const onStack = new Set<string>();
    const stack: string[] = [];
    const sccs: string[][] = [];
    let currentIndex = 0;

    const strongConnect = (nodeId: string): void => {
      index.set(nodeId, currentIndex);
      lowlink.set(nodeId, currentIndex);
      currentIndex++;
      stack.push(nodeId);
      onStack.add(nodeId);

      for (const depId of this.dependencies(nodeId)) {
        if (!index.has(depId)) {
          strongConnect(depId);
          lowlink.set(nodeId, Math.min(lowlink.get(nodeId) ?? 0, lowlink.get(depId) ?? 0));
        } else if (onStack.has(depId)) {
          lowlink.set(nodeId, Math.min(lowlink.get(nodeId) ?? 0, index.get(depId) ?? 0));
        }
      }

      if (lowlink.get(nodeId) === index.get(nodeId)) {
        const scc: string[] = [];
        let w: string | undefined;
        do {
          w = stack.pop();
          if (w === undefined) break;
          onStack.delete(w);
          scc.push(w);
        } while (w !== nodeId);

        if (scc.length > 1) {
          sccs.push(scc.sort());
        } else if (this.outgoing(nodeId).some((edge) => edge.target === nodeId)) {
          sccs.push(scc);
        }
      }
    };

    for (const nodeId of this.sortedIds) {
      if (!index.has(nodeId)) {
        strongConnect(nodeId);
      }
    }

    return sccs.sort((a, b) => (a[0] ?? "").localeCompare(b[0] ?? ""));
  }

  /**
   * Normalized serialization: nodes sorted by id, edges by source, target, kind.
   */
  toJSON(): SerializedGraph {
    return {
      nodes: this.sortedIds.flatMap((id) => {
        const node = this.nodes.get(id);
        return node ? [{ ...node }] : [];
      }),
      edges: this.edges.map((edge) => ({ ...edge })),
    };
  }
}

function appendTo(index: Map<string, GraphEdge[]>, key: string, edge: GraphEdge): void {
  const list = index.get(key);
  if (list) {
    list.push(edge);
  } else {
    index.set(key, [edge]);
  }
}

function uniqueSorted(ids: string[]): string[] {
  return [...new Set(ids)].sort();
}
