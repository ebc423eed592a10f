/**
 * Impact Analysis Module
 *
 * Centrality, breaking-change detection, impact propagation, cascade
 * detection, summarization and risk assessment over a dependency graph.
 *
 * @module
 */

export * from "./types.js";
export {
  computeCentrality,
  selectCritical,
  identifyCriticalNodes,
  findCriticalPaths,
  type CentralityOptions,
} from "./centrality.js";
export {
  detectBreakingChanges,
  mitigationsFor,
  visibilityRank,
  type BreakingChangeOptions,
} from "./breaking-changes.js";
export { propagateImpact, type PropagationOptions } from "./impact-propagation.js";
export {
  detectCascades,
  findChangedNode,
  rankCascades,
  CASCADING_CHANGE_TYPES,
  CASCADE_HOP_RETENTION,
  type CascadeOptions,
} from "./cascade-detector.js";
export {
  summarizeGraph,
  estimateTokens,
  renderRecord,
  type SummaryInputs,
  type SummaryOptions,
} from "./graph-summarizer.js";
export { assessRisk, calculateRiskScore } from "./risk-assessment.js";
export {
  analyzeChange,
  analyzeMany,
  type ChangeInput,
  type AnalysisResult,
  type AnalyzeOptions,
  type AnalyzeManyOptions,
} from "./analyzer.js";
