/**
 * Dependency Graph Types
 *
 * @module
 */

import type { EntityKind, Visibility } from "../../utils/validation.js";

// =============================================================================
// Nodes
// =============================================================================

/**
 * Declared entity kinds plus `external`, the synthetic placeholder created for
 * references that resolve to nothing in the analyzed summaries.
 */
export type NodeKind = EntityKind | "external";

export interface NodeLocation {
  startLine: number;
  endLine: number;
}

export interface GraphNode {
  /** 16 hex chars, derived from (file, declaration order, kind, name) */
  id: string;
  kind: NodeKind;
  qualifiedName: string;
  /** Last segment of the qualified name, used for in-scope resolution */
  name: string;
  visibility: Visibility;
  exported: boolean;
  /** Normalized signature used for change detection; null when unknown */
  signature: string | null;
  /** File of the declaring summary; null for external nodes */
  file: string | null;
  /** Line span when the extractor reported one */
  location: NodeLocation | null;
  /** Position of the declaration inside its summary (-1 for externals) */
  declarationIndex: number;
}

// =============================================================================
// Edges
// =============================================================================

export type EdgeKind = "calls" | "contains" | "implements" | "dependsOn";

/**
 * Directed edge. `source → target` reads "source depends on target".
 */
export interface GraphEdge {
  source: string;
  target: string;
  kind: EdgeKind;
  weight: number;
}

export type EdgeWeights = Record<EdgeKind, number>;

export const DEFAULT_EDGE_WEIGHTS: Readonly<EdgeWeights> = Object.freeze({
  calls: 1.0,
  contains: 0.5,
  implements: 0.8,
  dependsOn: 0.8,
});

// =============================================================================
// Diagnostics
// =============================================================================

export type DiagnosticCategory = "malformed_input" | "unresolved_reference" | "duplicate_entity";

/**
 * Non-fatal finding recorded while reading summaries or building a graph.
 */
export interface GraphDiagnostic {
  category: DiagnosticCategory;
  message: string;
  file?: string;
  /** Index of the offending entry inside its summary */
  index?: number;
  qualifiedName?: string;
}

export type ConflictPolicy = "first-wins" | "last-wins";

// =============================================================================
// Statistics & Serialization
// =============================================================================

export interface GraphStats {
  nodeCount: number;
  edgeCount: number;
  nodesByKind: Record<NodeKind, number>;
  edgesByKind: Record<EdgeKind, number>;
  /** Nodes with no outgoing edges */
  leafNodes: number;
  /** Nodes nothing depends on */
  rootNodes: number;
  averageDegree: number;
  cycleCount: number;
}

export interface SerializedGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}
