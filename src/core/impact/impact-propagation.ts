/**
 * Impact Propagation
 *
 * Multi-source, level-by-level BFS over reverse edges: from each changed node
 * to the entities that depend on it. A node first reached at distance `d`
 * scores the maximum over its parents at distance `d - 1` of
 * `parentScore × edgeWeight × decay^d`. Paths are never summed, so diamond
 * dependencies are not double-counted. Every node is visited once, which
 * bounds the walk on cyclic graphs.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { DEFAULT_ANALYSIS_CONFIG } from "../config.js";
import type { DependencyGraph } from "../dependency-graph/dependency-graph.js";
import type { ImpactScope, ImpactStatistics, IndirectImpact } from "./types.js";

const logger = createLogger("impact-propagation");

export interface PropagationOptions {
  maxDepth?: number;
  decayFactor?: number;
  /** Score at or above which an impacted node counts as high impact */
  highImpactThreshold?: number;
}

interface Visit {
  distance: number;
  score: number;
}

export function propagateImpact(
  graph: DependencyGraph,
  changedIds: Iterable<string>,
  options: PropagationOptions = {}
): ImpactScope {
  const maxDepth = options.maxDepth ?? DEFAULT_ANALYSIS_CONFIG.maxDepth;
  const decay = options.decayFactor ?? DEFAULT_ANALYSIS_CONFIG.decayFactor;
  const highImpactThreshold =
    options.highImpactThreshold ?? DEFAULT_ANALYSIS_CONFIG.highImpactThreshold;

  const requested = [...new Set(changedIds)].sort();
  const unknown = requested.filter((id) => !graph.hasNode(id));
  if (unknown.length > 0) {
    logger.warn({ unknown }, "Ignoring changed ids that are not in the graph");
  }
  const sourceNodes = requested.filter((id) => graph.hasNode(id));

  const visits = new Map<string, Visit>();
  for (const id of sourceNodes) {
    visits.set(id, { distance: 0, score: 1 });
  }

  let frontier = sourceNodes;
  for (let distance = 1; distance <= maxDepth && frontier.length > 0; distance++) {
    const factor = decay ** distance;
    const reached = new Map<string, number>();

    for (const parentId of frontier) {
      const parentScore = visits.get(parentId)?.score ?? 0;
      for (const edge of graph.incoming(parentId)) {
        if (visits.has(edge.source)) continue;
        const score = parentScore * edge.weight * factor;
        const best = reached.get(edge.source);
        if (best === undefined || score > best) {
          reached.set(edge.source, score);
        }
      }
    }

    frontier = [...reached.keys()].sort();
    for (const id of frontier) {
      visits.set(id, { distance, score: reached.get(id) ?? 0 });
    }
  }

  const directImpacts: string[] = [];
  const indirectImpacts = new Map<string, IndirectImpact>();
  const scores = new Map<string, number>();

  for (const [id, visit] of visits) {
    if (visit.distance === 0) continue;
    scores.set(id, visit.score);
    if (visit.distance === 1) {
      directImpacts.push(id);
    } else {
      indirectImpacts.set(id, { distance: visit.distance, score: visit.score });
    }
  }

  const statistics = computeStatistics(graph, scores, visits, directImpacts.length, highImpactThreshold);

  logger.debug(
    { sources: sourceNodes.length, impacted: statistics.totalImpacted, maxDistance: statistics.maxDistance },
    "Impact propagated"
  );

  return {
    sourceNodes,
    directImpacts: directImpacts.sort(),
    indirectImpacts,
    scores,
    statistics,
  };
}

function computeStatistics(
  graph: DependencyGraph,
  scores: Map<string, number>,
  visits: Map<string, Visit>,
  directCount: number,
  highImpactThreshold: number
): ImpactStatistics {
  const values = [...scores.values()];
  const totalImpacted = values.length;
  let maxDistance = 0;
  for (const visit of visits.values()) {
    maxDistance = Math.max(maxDistance, visit.distance);
  }

  return {
    totalImpacted,
    directCount,
    indirectCount: totalImpacted - directCount,
    highImpactCount: values.filter((score) => score >= highImpactThreshold).length,
    maxDistance,
    averageScore: totalImpacted === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / totalImpacted,
    impactRadius: graph.size === 0 ? 0 : totalImpacted / graph.size,
  };
}
