/**
 * Graph Summarizer
 *
 * Picks the most relevant nodes for a report or prompt under a record cap and
 * a token budget. Truncation is always reported.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { DEFAULT_ANALYSIS_CONFIG } from "../config.js";
import type { DependencyGraph } from "../dependency-graph/dependency-graph.js";
import type { GraphNode } from "../dependency-graph/types.js";
import type { GraphSummary, ImpactScope, SummaryEntry, TokenEstimator } from "./types.js";

const logger = createLogger("graph-summarizer");

export interface SummaryInputs {
  /** PageRank scores; normalized by their maximum before weighting */
  centrality: ReadonlyMap<string, number>;
  /** Changed sources count as impact 1.0 */
  impact?: ImpactScope;
}

export interface SummaryOptions {
  topK?: number;
  tokenBudget?: number;
  summaryWeights?: { centrality: number; impact: number };
  estimateTokens?: TokenEstimator;
}

/**
 * Roughly four characters per token.
 */
export const estimateTokens: TokenEstimator = (record) => Math.ceil(record.length / 4);

/**
 * One-line rendering of a node, the unit the token budget is spent on.
 */
export function renderRecord(node: GraphNode): string {
  const line = node.location ? `:${node.location.startLine}` : "";
  const location = node.file !== null ? ` @ ${node.file}${line}` : "";
  const signature = node.signature ? ` ${node.signature}` : "";
  return `${node.kind} ${node.qualifiedName}${location}${signature}`;
}

/**
 * Ranks every node by `wc × centrality / maxCentrality + wi × impact` and
 * greedily admits them in descending order (ties by id) until `topK` records
 * or the token budget is reached. The first record is always admitted, so the
 * budget is exceeded by at most that one record.
 */
export function summarizeGraph(
  graph: DependencyGraph,
  inputs: SummaryInputs,
  options: SummaryOptions = {}
): GraphSummary {
  const topK = options.topK ?? DEFAULT_ANALYSIS_CONFIG.topK;
  const budget = options.tokenBudget ?? DEFAULT_ANALYSIS_CONFIG.tokenBudget;
  const weights = options.summaryWeights ?? DEFAULT_ANALYSIS_CONFIG.summaryWeights;
  const estimate = options.estimateTokens ?? estimateTokens;

  let maxCentrality = 0;
  for (const score of inputs.centrality.values()) {
    maxCentrality = Math.max(maxCentrality, score);
  }
  const sources = new Set(inputs.impact?.sourceNodes ?? []);

  const candidates = graph.nodeIds().flatMap((id) => {
    const node = graph.getNode(id);
    if (!node) return [];
    const raw = inputs.centrality.get(id) ?? 0;
    const centrality = maxCentrality > 0 ? raw / maxCentrality : 0;
    const impact = sources.has(id) ? 1 : inputs.impact?.scores.get(id) ?? 0;
    return [
      {
        node,
        centrality,
        impact,
        score: weights.centrality * centrality + weights.impact * impact,
      },
    ];
  });

  candidates.sort((a, b) =>
    b.score !== a.score ? b.score - a.score : a.node.id < b.node.id ? -1 : a.node.id > b.node.id ? 1 : 0
  );

  const selected: SummaryEntry[] = [];
  let budgetUsed = 0;

  for (const candidate of candidates) {
    if (selected.length >= topK) break;
    const record = renderRecord(candidate.node);
    const tokens = estimate(record);
    if (selected.length > 0 && budgetUsed + tokens > budget) break;

    selected.push({
      id: candidate.node.id,
      qualifiedName: candidate.node.qualifiedName,
      kind: candidate.node.kind,
      score: candidate.score,
      centrality: candidate.centrality,
      impact: candidate.impact,
      record,
      tokens,
    });
    budgetUsed += tokens;
  }

  const omittedCount = candidates.length - selected.length;
  if (omittedCount > 0) {
    logger.debug({ selected: selected.length, omittedCount, budgetUsed, budget }, "Summary truncated");
  }

  return {
    selected,
    truncated: omittedCount > 0,
    omittedCount,
    budgetUsed,
    budgetTotal: budget,
    totalCandidates: candidates.length,
  };
}
