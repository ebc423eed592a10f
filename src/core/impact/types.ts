/**
 * Impact Analysis Types
 *
 * @module
 */

import type { EntityKind } from "../../utils/validation.js";
import type { EdgeKind, GraphDiagnostic } from "../dependency-graph/types.js";

// =============================================================================
// Centrality
// =============================================================================

export interface CentralityResult {
  /** Node id → score; scores sum to ≈ 1.0 */
  scores: Map<string, number>;
  iterations: number;
  /** False when `maxIterations` was reached before the L1 change fell below epsilon */
  converged: boolean;
  /** L1 change of the last iteration */
  delta: number;
  /** Critical node ids, highest score first */
  critical: string[];
}

export interface CriticalNode {
  id: string;
  centrality: number;
  /** Number of distinct dependents */
  fanIn: number;
  /** Number of distinct dependencies */
  fanOut: number;
}

// =============================================================================
// Breaking Changes
// =============================================================================

export type ChangeType =
  | "removed"
  | "added"
  | "signature_changed"
  | "visibility_reduced"
  | "visibility_widened";

export type Severity = "critical" | "high" | "medium" | "low" | "info";

export interface BreakingChange {
  changeType: ChangeType;
  kind: EntityKind;
  qualifiedName: string;
  /** File of the newer declaration, or of the old one when removed */
  file: string;
  /** Signature snippet before the change; null when the entity is new */
  before: string | null;
  /** Signature snippet after the change; null when the entity is gone */
  after: string | null;
  severity: Severity;
  description: string;
  mitigations: string[];
}

export interface BreakingChangeReport {
  changes: BreakingChange[];
  diagnostics: GraphDiagnostic[];
}

// =============================================================================
// Impact Propagation
// =============================================================================

export interface IndirectImpact {
  distance: number;
  score: number;
}

export interface ImpactStatistics {
  totalImpacted: number;
  directCount: number;
  indirectCount: number;
  highImpactCount: number;
  /** Deepest distance reached, 0 when nothing was impacted */
  maxDistance: number;
  averageScore: number;
  /** Impacted nodes / all nodes in the graph */
  impactRadius: number;
}

export interface ImpactScope {
  /** Changed node ids that exist in the graph, sorted */
  sourceNodes: string[];
  /** Distance-1 dependents, sorted */
  directImpacts: string[];
  /** Distance 2..maxDepth */
  indirectImpacts: Map<string, IndirectImpact>;
  /** Every impacted id (direct and indirect) → score */
  scores: Map<string, number>;
  statistics: ImpactStatistics;
}

// =============================================================================
// Cascades
// =============================================================================

export type CascadeTerminal = "public_api_exposure" | "compound_break" | "depth_limited";

export interface CascadeEffect {
  /** Node ids starting at the changed node; never repeats a node */
  path: string[];
  /** `edgeKinds[i]` is the kind of the edge between `path[i + 1]` and `path[i]` */
  edgeKinds: EdgeKind[];
  rootChange: BreakingChange;
  terminal: CascadeTerminal;
  /** Product of the per-hop retention along the path, in [0, 1] */
  probability: number;
  /** Root severity, one step lower for unlikely paths */
  severity: Severity;
}

// =============================================================================
// Summary
// =============================================================================

export interface SummaryEntry {
  id: string;
  qualifiedName: string;
  kind: string;
  score: number;
  centrality: number;
  impact: number;
  /** One-line record used for token estimation */
  record: string;
  tokens: number;
}

export interface GraphSummary {
  selected: SummaryEntry[];
  truncated: boolean;
  omittedCount: number;
  budgetUsed: number;
  budgetTotal: number;
  totalCandidates: number;
}

/** Estimates the token cost of a rendered record */
export type TokenEstimator = (record: string) => number;

// =============================================================================
// Risk
// =============================================================================

export type RiskLevel = Severity | "none";

export interface RiskAssessment {
  level: RiskLevel;
  /** 0-100 */
  score: number;
  counts: Record<Severity, number>;
  recommendations: string[];
  headline: string;
}
