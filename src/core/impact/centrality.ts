/**
 * Centrality Engine
 *
 * Weighted PageRank over the dependency graph. An edge `source → target`
 * passes importance from the dependent to its dependency, so heavily relied-on
 * entities rank highest.
 *
 * Each source's outgoing weights are normalized to 1. Dangling nodes (no
 * outgoing weight) spread their rank uniformly over all nodes, which keeps the
 * scores a probability distribution.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { DEFAULT_ANALYSIS_CONFIG, type CriticalThreshold } from "../config.js";
import type { DependencyGraph } from "../dependency-graph/dependency-graph.js";
import type { CentralityResult, CriticalNode } from "./types.js";

const logger = createLogger("centrality");

export interface CentralityOptions {
  dampingFactor?: number;
  epsilon?: number;
  maxIterations?: number;
  critical?: CriticalThreshold;
}

/**
 * Computes PageRank scores and flags critical nodes.
 *
 * @example
 * ```typescript
 * const { scores, converged, critical } = computeCentrality(graph, { dampingFactor: 0.85 });
 * if (!converged) logger.warn("scores are best-effort");
 * ```
 */
export function computeCentrality(
  graph: DependencyGraph,
  options: CentralityOptions = {}
): CentralityResult {
  const damping = options.dampingFactor ?? DEFAULT_ANALYSIS_CONFIG.dampingFactor;
  const epsilon = options.epsilon ?? DEFAULT_ANALYSIS_CONFIG.epsilon;
  const maxIterations = options.maxIterations ?? DEFAULT_ANALYSIS_CONFIG.maxIterations;
  const threshold = options.critical ?? DEFAULT_ANALYSIS_CONFIG.critical;

  const ids = graph.nodeIds();
  const n = ids.length;
  if (n === 0) {
    return { scores: new Map(), iterations: 0, converged: true, delta: 0, critical: [] };
  }

  const position = new Map<string, number>();
  ids.forEach((id, i) => position.set(id, i));

  // Per-source total outgoing weight; 0 marks a dangling node.
  const outWeight = new Float64Array(n);
  ids.forEach((id, i) => {
    outWeight[i] = graph.outgoing(id).reduce((sum, edge) => sum + edge.weight, 0);
  });

  // Incoming contributions as (source index, normalized weight) pairs.
  const inbound: Array<Array<[number, number]>> = ids.map((id) =>
    graph.incoming(id).flatMap((edge): Array<[number, number]> => {
      const from = position.get(edge.source);
      if (from === undefined) return [];
      const total = outWeight[from] ?? 0;
      return total > 0 ? [[from, edge.weight / total]] : [];
    })
  );

  let rank = new Float64Array(n).fill(1 / n);
  let iterations = 0;
  let delta = Number.POSITIVE_INFINITY;
  const base = (1 - damping) / n;

  while (iterations < maxIterations) {
    let danglingMass = 0;
    for (let i = 0; i < n; i++) {
      if ((outWeight[i] ?? 0) <= 0) danglingMass += rank[i] ?? 0;
    }
    const danglingShare = (damping * danglingMass) / n;

    const next = new Float64Array(n);
    delta = 0;
    for (let i = 0; i < n; i++) {
      let flow = 0;
      for (const [from, share] of inbound[i] ?? []) {
        flow += (rank[from] ?? 0) * share;
      }
      const value = base + danglingShare + damping * flow;
      next[i] = value;
      delta += Math.abs(value - (rank[i] ?? 0));
    }

    rank = next;
    iterations++;
    if (delta < epsilon) break;
  }

  const converged = delta < epsilon;
  const scores = new Map<string, number>();
  ids.forEach((id, i) => scores.set(id, rank[i] ?? 0));

  const critical = selectCritical(scores, threshold);

  if (!converged) {
    logger.warn({ iterations, delta, nodes: n }, "PageRank did not converge, returning best-effort scores");
  } else {
    logger.debug({ iterations, delta, nodes: n, critical: critical.length }, "PageRank converged");
  }

  return { scores, iterations, converged, delta, critical };
}

/**
 * Flags nodes whose score lies strictly above the threshold, ordered by
 * descending score with ties broken by id.
 */
export function selectCritical(
  scores: ReadonlyMap<string, number>,
  threshold: CriticalThreshold
): string[] {
  const values = [...scores.values()];
  if (values.length === 0) return [];

  let cutoff: number;
  if (threshold.method === "sigma") {
    const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
    const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
    cutoff = mean + threshold.value * Math.sqrt(variance);
  } else {
    const ascending = [...values].sort((a, b) => a - b);
    const index = Math.floor(threshold.value * (ascending.length - 1));
    cutoff = ascending[index] ?? Number.POSITIVE_INFINITY;
  }

  return [...scores.entries()]
    .filter(([, score]) => score > cutoff)
    .sort(([idA, a], [idB, b]) => (b !== a ? b - a : idA < idB ? -1 : idA > idB ? 1 : 0))
    .map(([id]) => id);
}

// =============================================================================
// Critical Nodes & Paths
// =============================================================================

/**
 * Describes each critical node with its score and fan-in / fan-out, in the
 * order of `centrality.critical`.
 */
export function identifyCriticalNodes(
  graph: DependencyGraph,
  centrality: CentralityResult
): CriticalNode[] {
  return centrality.critical.map((id) => ({
    id,
    centrality: centrality.scores.get(id) ?? 0,
    fanIn: graph.dependents(id).length,
    fanOut: graph.dependencies(id).length,
  }));
}

/**
 * Dependency chains leaving each start node, followed forward until they reach
 * `maxLength` nodes or run out of unvisited dependencies. Chains of a single
 * node are left out.
 */
export function findCriticalPaths(
  graph: DependencyGraph,
  startIds: readonly string[],
  maxLength = 3
): string[][] {
  const paths: string[][] = [];

  const walk = (path: string[]): void => {
    const last = path[path.length - 1];
    const next =
      last === undefined || path.length >= maxLength
        ? []
        : graph.dependencies(last).filter((id) => !path.includes(id));

    if (next.length === 0) {
      if (path.length > 1) paths.push([...path]);
      return;
    }
    for (const id of next) {
      walk([...path, id]);
    }
  };

  for (const id of startIds) {
    if (graph.hasNode(id)) walk([id]);
  }
  return paths;
}
