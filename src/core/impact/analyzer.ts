/**
 * Change Analyzer
 *
 * One-call entry point that wires the engine together:
 *
 * 1. resolve and validate the configuration
 * 2. build graphs for the `after`, `before` and `context` summaries and overlay
 *    them (after wins, then before, then context) so removed entities and
 *    their former callers stay visible
 * 3. detect breaking changes
 * 4. rank nodes by centrality and describe the critical ones
 * 5. propagate impact from the changed nodes
 * 6. detect cascades
 * 7. assess risk and summarize
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { mapConcurrent, yieldToEventLoop } from "../../utils/async.js";
import type { StructuralSummary } from "../../utils/validation.js";
import { err, ok, type Result } from "../../types/result.js";
import { resolveAnalysisConfig, type AnalysisConfig, type AnalysisConfigInput } from "../config.js";
import { ErrorCode, wrapError, type ImpactEngineError } from "../errors.js";
import type { DependencyGraph } from "../dependency-graph/dependency-graph.js";
import { buildGraph, mergeGraphs } from "../dependency-graph/graph-builder.js";
import type { GraphDiagnostic } from "../dependency-graph/types.js";
import { detectBreakingChanges } from "./breaking-changes.js";
import { detectCascades, findChangedNode } from "./cascade-detector.js";
import { computeCentrality, findCriticalPaths, identifyCriticalNodes } from "./centrality.js";
import { summarizeGraph } from "./graph-summarizer.js";
import { propagateImpact } from "./impact-propagation.js";
import { assessRisk } from "./risk-assessment.js";
import type {
  BreakingChange,
  CascadeEffect,
  CentralityResult,
  CriticalNode,
  GraphSummary,
  ImpactScope,
  RiskAssessment,
  TokenEstimator,
} from "./types.js";

const logger = createLogger("analyzer");

// =============================================================================
// Types
// =============================================================================

export interface ChangeInput {
  before: StructuralSummary[];
  after: StructuralSummary[];
  /** Unchanged code that may depend on the changed entities */
  context?: StructuralSummary[];
  /**
   * Qualified names to propagate from in addition to the detected breaking
   * changes, e.g. entities whose body changed without an API difference
   */
  changedNames?: string[];
}

export interface AnalysisResult {
  config: AnalysisConfig;
  graph: DependencyGraph;
  changes: BreakingChange[];
  centrality: CentralityResult;
  criticalNodes: CriticalNode[];
  /** Dependency chains leaving the critical nodes */
  criticalPaths: string[][];
  impact: ImpactScope;
  cascades: CascadeEffect[];
  risk: RiskAssessment;
  summary: GraphSummary;
  diagnostics: GraphDiagnostic[];
  durationMs: number;
}

export interface AnalyzeOptions {
  estimateTokens?: TokenEstimator;
}

export interface AnalyzeManyOptions extends AnalyzeOptions {
  /** Overrides `config.concurrency` */
  concurrency?: number;
}

// =============================================================================
// Single Analysis
// =============================================================================

/**
 * Analyzes one change end to end.
 *
 * @throws ConfigurationError when `config` is invalid, before any work starts
 *
 * @example
 * ```typescript
 * const result = analyzeChange({ before, after }, { maxDepth: 3 });
 * console.log(result.risk.headline);
 * for (const entry of result.summary.selected) console.log(entry.record);
 * ```
 */
export function analyzeChange(
  input: ChangeInput,
  config: AnalysisConfigInput = {},
  options: AnalyzeOptions = {}
): AnalysisResult {
  const resolved = resolveAnalysisConfig(config);
  const startTime = Date.now();

  const graph = buildChangeGraph(input, resolved);
  const report = detectBreakingChanges(input.before, input.after, {
    conflictPolicy: resolved.conflictPolicy,
  });

  const centrality = computeCentrality(graph, {
    dampingFactor: resolved.dampingFactor,
    epsilon: resolved.epsilon,
    maxIterations: resolved.maxIterations,
    critical: resolved.critical,
  });
  const criticalNodes = identifyCriticalNodes(graph, centrality);
  const criticalPaths = findCriticalPaths(graph, centrality.critical);

  const changedIds = collectChangedIds(graph, report.changes, input.changedNames ?? []);
  const impact = propagateImpact(graph, changedIds, {
    maxDepth: resolved.maxDepth,
    decayFactor: resolved.decayFactor,
    highImpactThreshold: resolved.highImpactThreshold,
  });

  const cascades = detectCascades(graph, report.changes, {
    maxDepth: resolved.maxDepth,
    maxCascadePaths: resolved.maxCascadePaths,
    minProbability: resolved.minCascadeProbability,
    minLength: resolved.minCascadeLength,
  });

  const risk = assessRisk(report.changes, cascades);

  const summary = summarizeGraph(
    graph,
    { centrality: centrality.scores, impact },
    {
      topK: resolved.topK,
      tokenBudget: resolved.tokenBudget,
      summaryWeights: resolved.summaryWeights,
      estimateTokens: options.estimateTokens,
    }
  );

  const durationMs = Date.now() - startTime;
  logger.info(
    {
      nodes: graph.size,
      changes: report.changes.length,
      impacted: impact.statistics.totalImpacted,
      cascades: cascades.length,
      risk: risk.level,
      durationMs,
    },
    "Change analyzed"
  );

  return {
    config: resolved,
    graph,
    changes: report.changes,
    centrality,
    criticalNodes,
    criticalPaths,
    impact,
    cascades,
    risk,
    summary,
    diagnostics: dedupeDiagnostics([...graph.diagnostics, ...report.diagnostics]),
    durationMs,
  };
}

// =============================================================================
// Batch Analysis
// =============================================================================

/**
 * Analyzes independent changes with bounded concurrency. A failing input
 * yields an error result without affecting the others; an invalid config
 * rejects the whole batch up front.
 */
export async function analyzeMany(
  inputs: readonly ChangeInput[],
  config: AnalysisConfigInput = {},
  options: AnalyzeManyOptions = {}
): Promise<Array<Result<AnalysisResult, ImpactEngineError>>> {
  const resolved = resolveAnalysisConfig(config);
  const concurrency = options.concurrency ?? resolved.concurrency;

  logger.debug({ inputs: inputs.length, concurrency }, "Starting batch analysis");

  return mapConcurrent(
    inputs,
    async (input, index): Promise<Result<AnalysisResult, ImpactEngineError>> => {
      await yieldToEventLoop();
      try {
        return ok(analyzeChange(input, resolved, options));
      } catch (error) {
        const wrapped = wrapError(error, `Analysis #${index} failed`, ErrorCode.UNKNOWN_ERROR);
        logger.error({ index, error: wrapped.toJSON() }, "Analysis failed");
        return err(wrapped);
      }
    },
    concurrency
  );
}

// =============================================================================
// Helpers
// =============================================================================

function buildChangeGraph(input: ChangeInput, config: AnalysisConfig): DependencyGraph {
  const buildOptions = { conflictPolicy: config.conflictPolicy, edgeWeights: config.edgeWeights };
  const after = buildGraph(input.after, buildOptions);
  const before = buildGraph(input.before, buildOptions);

  let graph = mergeGraphs(after, before, { conflictPolicy: "first-wins", reportConflicts: false });
  if (input.context && input.context.length > 0) {
    graph = mergeGraphs(graph, buildGraph(input.context, buildOptions), {
      conflictPolicy: "first-wins",
    });
  }
  return graph;
}

function collectChangedIds(
  graph: DependencyGraph,
  changes: readonly BreakingChange[],
  changedNames: readonly string[]
): string[] {
  const ids = new Set<string>();
  for (const change of changes) {
    const node = findChangedNode(graph, change);
    if (node) ids.add(node.id);
  }
  for (const name of changedNames) {
    const node = graph.getNodeByName(name);
    if (node) {
      ids.add(node.id);
    } else {
      logger.warn({ name }, "Changed name not found in graph");
    }
  }
  return [...ids];
}

function dedupeDiagnostics(diagnostics: readonly GraphDiagnostic[]): GraphDiagnostic[] {
  const seen = new Set<string>();
  return diagnostics.filter((diagnostic) => {
    const key = `${diagnostic.category}|${diagnostic.file ?? ""}|${diagnostic.index ?? ""}|${diagnostic.message}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
