/**
 * Graph Builder
 *
 * Turns structural summaries into a {@link DependencyGraph}.
 *
 * Edges come from three sources:
 * - explicit relationships (calls / contains / implements / dependsOn)
 * - lexical nesting (`parent`): parent → child, contains
 * - declared type relations (`implements` / `extends`): entity → supertype, implements
 *
 * Relationship endpoints are names resolved in scope of the summary's file.
 * Names that resolve to nothing become synthetic `external` nodes so that no
 * edge is ever dropped.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import type { StructuralSummary } from "../../utils/validation.js";
import { DependencyGraph, edgeKey } from "./dependency-graph.js";
import { generateExternalId, generateNodeId, shortName } from "./id-generator.js";
import { readSummaries, type Declaration } from "./summary-reader.js";
import {
  DEFAULT_EDGE_WEIGHTS,
  type ConflictPolicy,
  type EdgeKind,
  type EdgeWeights,
  type GraphDiagnostic,
  type GraphEdge,
  type GraphNode,
} from "./types.js";

const logger = createLogger("graph-builder");

// =============================================================================
// Options
// =============================================================================

export interface GraphBuildOptions {
  /** Which declaration survives when a qualified name is declared twice */
  conflictPolicy?: ConflictPolicy;
  edgeWeights?: Partial<EdgeWeights>;
}

export interface GraphMergeOptions {
  /** `first-wins` keeps the node from the first graph */
  conflictPolicy?: ConflictPolicy;
  /**
   * Record a `duplicate_entity` diagnostic for every conflicting pair
   * (default true). Overlays of two snapshots of the same code disable this.
   */
  reportConflicts?: boolean;
}

// =============================================================================
// Scope Index
// =============================================================================

/**
 * Lookup tables for in-scope name resolution.
 */
interface ScopeIndex {
  byQualifiedName: Map<string, string>;
  /** file → short name → node ids */
  byFile: Map<string, Map<string, string[]>>;
  /** short name → node ids across all files */
  byShortName: Map<string, string[]>;
}

type Resolution =
  | { kind: "resolved"; id: string }
  | { kind: "unresolved"; candidates: number };

// =============================================================================
// Graph Builder
// =============================================================================

/**
 * Builds dependency graphs from structural summaries.
 *
 * @example
 * ```typescript
 * const builder = new GraphBuilder({ conflictPolicy: "first-wins" });
 * const graph = builder.build(summaries);
 *
 * for (const diagnostic of graph.diagnostics) {
 *   console.warn(diagnostic.category, diagnostic.message);
 * }
 * ```
 */
export class GraphBuilder {
  private readonly conflictPolicy: ConflictPolicy;
  private readonly weights: EdgeWeights;

  constructor(options: GraphBuildOptions = {}) {
    this.conflictPolicy = options.conflictPolicy ?? "first-wins";
    this.weights = { ...DEFAULT_EDGE_WEIGHTS, ...options.edgeWeights };
  }

  build(summaries: readonly StructuralSummary[]): DependencyGraph {
    const { declarations, relationships, diagnostics } = readSummaries(summaries);

    const winners = this.selectWinners(declarations, diagnostics);
    const nodes = new Map<string, GraphNode>();
    for (const decl of winners) {
      const node = toNode(decl);
      nodes.set(node.id, node);
    }

    const scope = buildScopeIndex([...nodes.values()]);
    const edges = new Map<string, GraphEdge>();

    const resolveOrExternal = (name: string, file: string, index?: number): string => {
      const resolution = resolveName(scope, name, file);
      if (resolution.kind === "resolved") return resolution.id;

      const external = createExternalNode(name);
      if (!nodes.has(external.id)) {
        nodes.set(external.id, external);
      }
      diagnostics.push({
        category: "unresolved_reference",
        message:
          resolution.candidates > 1
            ? `Ambiguous reference "${name}" (${resolution.candidates} candidates), linked to an external node`
            : `Unresolved reference "${name}", linked to an external node`,
        file,
        index,
        qualifiedName: name,
      });
      return external.id;
    };

    const addEdge = (source: string, target: string, kind: EdgeKind): void => {
      const edge: GraphEdge = { source, target, kind, weight: this.weights[kind] };
      const key = edgeKey(edge);
      if (!edges.has(key)) {
        edges.set(key, edge);
      }
    };

    for (const decl of winners) {
      const id = scope.byQualifiedName.get(decl.qualifiedName);
      if (id === undefined) continue;

      if (decl.parent !== null) {
        addEdge(resolveOrExternal(decl.parent, decl.file), id, "contains");
      }
      for (const supertype of decl.implementsNames) {
        addEdge(id, resolveOrExternal(supertype, decl.file), "implements");
      }
    }

    for (const rel of relationships) {
      const source = resolveOrExternal(rel.from, rel.file, rel.index);
      const target = resolveOrExternal(rel.to, rel.file, rel.index);
      addEdge(source, target, rel.kind);
    }

    const graph = new DependencyGraph([...nodes.values()], [...edges.values()], diagnostics);

    logger.info(
      {
        summaries: summaries.length,
        nodes: graph.size,
        edges: graph.edgeCount,
        diagnostics: diagnostics.length,
      },
      "Dependency graph built"
    );

    return graph;
  }

  /**
   * Applies the conflict policy to duplicate qualified names. Declarations are
   * already in canonical (file, declaration) order.
   */
  private selectWinners(declarations: Declaration[], diagnostics: GraphDiagnostic[]): Declaration[] {
    const winners = new Map<string, Declaration>();

    for (const decl of declarations) {
      const existing = winners.get(decl.qualifiedName);
      if (!existing) {
        winners.set(decl.qualifiedName, decl);
        continue;
      }

      const kept = this.conflictPolicy === "first-wins" ? existing : decl;
      const dropped = kept === existing ? decl : existing;
      diagnostics.push({
        category: "duplicate_entity",
        message: `Duplicate declaration of "${decl.qualifiedName}": kept ${describe(kept)}, dropped ${describe(dropped)} (${this.conflictPolicy})`,
        file: dropped.file,
        index: dropped.declarationIndex,
        qualifiedName: decl.qualifiedName,
      });
      if (kept === decl) {
        // Re-insert so the winner takes the later position in iteration order.
        winners.delete(decl.qualifiedName);
        winners.set(decl.qualifiedName, decl);
      }
    }

    return [...winners.values()];
  }
}

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Builds a graph in one call.
 */
export function buildGraph(
  summaries: readonly StructuralSummary[],
  options: GraphBuildOptions = {}
): DependencyGraph {
  return new GraphBuilder(options).build(summaries);
}

/**
 * Composes two graphs, e.g. a whole-project scan plus a diff overlay.
 *
 * Nodes are matched by qualified name. A declared node always replaces an
 * `external` placeholder of the same name; otherwise the conflict policy
 * decides and the conflict is recorded. Edges are re-pointed at the surviving
 * nodes and de-duplicated.
 */
export function mergeGraphs(
  first: DependencyGraph,
  second: DependencyGraph,
  options: GraphMergeOptions = {}
): DependencyGraph {
  const policy = options.conflictPolicy ?? "first-wins";
  const reportConflicts = options.reportConflicts ?? true;
  const diagnostics: GraphDiagnostic[] = [...first.diagnostics, ...second.diagnostics];
  const winners = new Map<string, GraphNode>();

  const offer = (node: GraphNode): void => {
    const existing = winners.get(node.qualifiedName);
    if (!existing) {
      winners.set(node.qualifiedName, node);
      return;
    }
    if (existing.id === node.id) return;

    if (existing.kind === "external" || node.kind === "external") {
      if (existing.kind === "external" && node.kind !== "external") {
        winners.set(node.qualifiedName, node);
      }
      return;
    }

    const kept = policy === "first-wins" ? existing : node;
    const dropped = kept === existing ? node : existing;
    if (reportConflicts) {
      diagnostics.push({
        category: "duplicate_entity",
        message: `Merge conflict on "${node.qualifiedName}": kept ${describeNode(kept)}, dropped ${describeNode(dropped)} (${policy})`,
        file: dropped.file ?? undefined,
        index: dropped.declarationIndex,
        qualifiedName: node.qualifiedName,
      });
    }
    winners.set(node.qualifiedName, kept);
  };

  for (const graph of [first, second]) {
    for (const id of graph.nodeIds()) {
      const node = graph.getNode(id);
      if (node) offer(node);
    }
  }

  const edges = new Map<string, GraphEdge>();
  for (const graph of [first, second]) {
    for (const edge of graph.edges) {
      const source = survivorId(graph, edge.source, winners);
      const target = survivorId(graph, edge.target, winners);
      if (source === undefined || target === undefined) continue;
      const merged: GraphEdge = { ...edge, source, target };
      const key = edgeKey(merged);
      if (!edges.has(key)) {
        edges.set(key, merged);
      }
    }
  }

  const merged = new DependencyGraph([...winners.values()], [...edges.values()], diagnostics);
  logger.debug(
    { first: first.size, second: second.size, merged: merged.size, edges: merged.edgeCount },
    "Graphs merged"
  );
  return merged;
}

// =============================================================================
// Internal Helpers
// =============================================================================

function toNode(decl: Declaration): GraphNode {
  return {
    id: generateNodeId(decl.file, decl.declarationIndex, decl.kind, decl.qualifiedName),
    kind: decl.kind,
    qualifiedName: decl.qualifiedName,
    name: decl.name,
    visibility: decl.visibility,
    exported: decl.exported,
    signature: decl.signature,
    file: decl.file,
    location: decl.location,
    declarationIndex: decl.declarationIndex,
  };
}

function createExternalNode(name: string): GraphNode {
  return {
    id: generateExternalId(name),
    kind: "external",
    qualifiedName: name,
    name: shortName(name),
    visibility: "public",
    exported: false,
    signature: null,
    file: null,
    location: null,
    declarationIndex: -1,
  };
}

function buildScopeIndex(nodes: GraphNode[]): ScopeIndex {
  const index: ScopeIndex = {
    byQualifiedName: new Map(),
    byFile: new Map(),
    byShortName: new Map(),
  };

  for (const node of nodes) {
    index.byQualifiedName.set(node.qualifiedName, node.id);
    pushTo(index.byShortName, node.name, node.id);

    const file = node.file;
    if (file !== null) {
      let fileScope = index.byFile.get(file);
      if (!fileScope) {
        fileScope = new Map();
        index.byFile.set(file, fileScope);
      }
      pushTo(fileScope, node.name, node.id);
    }
  }

  return index;
}

/**
 * Resolves a referenced name: exact qualified name, then a unique short-name
 * match in the same file, then a unique short-name match anywhere.
 */
function resolveName(scope: ScopeIndex, name: string, file: string): Resolution {
  const exact = scope.byQualifiedName.get(name);
  if (exact !== undefined) return { kind: "resolved", id: exact };

  const short = shortName(name);
  const local = scope.byFile.get(file)?.get(short) ?? [];
  if (local.length === 1 && local[0] !== undefined) return { kind: "resolved", id: local[0] };

  const global = scope.byShortName.get(short) ?? [];
  if (local.length === 0 && global.length === 1 && global[0] !== undefined) {
    return { kind: "resolved", id: global[0] };
  }

  return { kind: "unresolved", candidates: Math.max(local.length, global.length) };
}

function survivorId(
  graph: DependencyGraph,
  id: string,
  winners: Map<string, GraphNode>
): string | undefined {
  const node = graph.getNode(id);
  return node ? winners.get(node.qualifiedName)?.id : undefined;
}

function pushTo(map: Map<string, string[]>, key: string, value: string): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

function describe(decl: Declaration): string {
  return `${decl.file}#${decl.declarationIndex}`;
}

function describeNode(node: GraphNode): string {
  return node.file !== null ? `${node.file}#${node.declarationIndex}` : node.id;
}
