/**
 * Cascade Detector
 *
 * Finds multi-hop chains through which a breaking change reaches other parts
 * of the system. From each breaking change, a depth-bounded DFS walks reverse
 * edges (towards dependents) and records a path when it reaches:
 *
 * - another node carrying a breaking change (`compound_break`), where the walk stops
 * - an exported node (`public_api_exposure`), where the walk continues
 * - the depth limit at a node that still has unexplored dependents (`depth_limited`)
 *
 * A recorded path that is a strict prefix of a longer recorded path from the
 * same root is dropped.
 *
 * Each path carries a probability, the product of `min(1, weight) × 0.85` over
 * its edges, and a severity taken from the root change, one step lower when
 * the probability is below 0.5. Paths shorter than `minLength` nodes or less
 * likely than `minProbability` are not recorded.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { DEFAULT_ANALYSIS_CONFIG } from "../config.js";
import type { DependencyGraph } from "../dependency-graph/dependency-graph.js";
import type { EdgeKind, GraphNode } from "../dependency-graph/types.js";
import type {
  BreakingChange,
  CascadeEffect,
  CascadeTerminal,
  ChangeType,
  Severity,
} from "./types.js";

const logger = createLogger("cascade-detector");

/** Share of a break that survives one hop over an edge of weight 1 */
export const CASCADE_HOP_RETENTION = 0.85;

/** Change types that can break dependents */
export const CASCADING_CHANGE_TYPES: ReadonlySet<ChangeType> = new Set<ChangeType>([
  "removed",
  "signature_changed",
  "visibility_reduced",
]);

export interface CascadeOptions {
  /** Maximum number of hops from the changed node */
  maxDepth?: number;
  /** Upper bound on recorded paths across all roots */
  maxCascadePaths?: number;
  /** Paths less likely than this are not recorded */
  minProbability?: number;
  /** Minimum number of nodes in a recorded path, root included */
  minLength?: number;
}

interface Dependent {
  id: string;
  kind: EdgeKind;
  weight: number;
}

type FoundPath = Omit<CascadeEffect, "rootChange" | "severity">;

/**
 * Resolves the graph node a breaking change refers to.
 */
export function findChangedNode(
  graph: DependencyGraph,
  change: BreakingChange
): GraphNode | undefined {
  const node = graph.getNodeByName(change.qualifiedName);
  return node && node.kind === change.kind ? node : undefined;
}

export function detectCascades(
  graph: DependencyGraph,
  changes: readonly BreakingChange[],
  options: CascadeOptions = {}
): CascadeEffect[] {
  const maxDepth = options.maxDepth ?? DEFAULT_ANALYSIS_CONFIG.maxDepth;
  const maxPaths = options.maxCascadePaths ?? DEFAULT_ANALYSIS_CONFIG.maxCascadePaths;
  const minProbability = options.minProbability ?? DEFAULT_ANALYSIS_CONFIG.minCascadeProbability;
  const minLength = options.minLength ?? DEFAULT_ANALYSIS_CONFIG.minCascadeLength;

  const roots: Array<{ id: string; change: BreakingChange }> = [];
  for (const change of changes) {
    if (!CASCADING_CHANGE_TYPES.has(change.changeType)) continue;
    const node = findChangedNode(graph, change);
    if (!node) {
      logger.debug({ qualifiedName: change.qualifiedName }, "Breaking change has no graph node");
      continue;
    }
    roots.push({ id: node.id, change });
  }

  const breakingNodes = new Set(roots.map((root) => root.id));
  const effects: CascadeEffect[] = [];
  let recorded = 0;
  let capped = false;

  for (const root of roots) {
    if (capped) break;
    const found: FoundPath[] = [];
    const path = [root.id];
    const edgeKinds: EdgeKind[] = [];
    const probabilities = [1];
    const onPath = new Set(path);

    const record = (terminal: CascadeTerminal): void => {
      const probability = probabilities[probabilities.length - 1] ?? 0;
      if (path.length < minLength || probability < minProbability) return;
      found.push({ path: [...path], edgeKinds: [...edgeKinds], probability, terminal });
      recorded++;
      if (recorded >= maxPaths) capped = true;
    };

    const explore = (nodeId: string, depth: number): void => {
      for (const dependent of dependentsOf(graph, nodeId)) {
        if (capped) return;
        if (onPath.has(dependent.id)) continue;

        const reaching = probabilities[probabilities.length - 1] ?? 0;
        path.push(dependent.id);
        edgeKinds.push(dependent.kind);
        probabilities.push(reaching * Math.min(1, dependent.weight) * CASCADE_HOP_RETENTION);
        onPath.add(dependent.id);

        if (breakingNodes.has(dependent.id)) {
          record("compound_break");
        } else {
          const exposed = graph.getNode(dependent.id)?.exported ?? false;
          if (exposed) record("public_api_exposure");

          if (depth + 1 >= maxDepth) {
            const unexplored = dependentsOf(graph, dependent.id).some((d) => !onPath.has(d.id));
            if (unexplored && !exposed && !capped) record("depth_limited");
          } else {
            explore(dependent.id, depth + 1);
          }
        }

        onPath.delete(dependent.id);
        probabilities.pop();
        edgeKinds.pop();
        path.pop();
      }
    };

    if (maxDepth > 0) explore(root.id, 0);

    for (const candidate of pruneStrictPrefixes(found)) {
      effects.push({
        ...candidate,
        rootChange: root.change,
        severity: cascadeSeverity(root.change.severity, candidate.probability),
      });
    }
  }

  if (capped) {
    logger.warn({ maxCascadePaths: maxPaths }, "Cascade exploration stopped at the path limit");
  }
  logger.debug({ roots: roots.length, cascades: effects.length }, "Cascades detected");

  return effects;
}

/**
 * Orders cascades by descending probability, keeping detection order among
 * equals, and keeps at most `limit` of them.
 */
export function rankCascades(
  cascades: readonly CascadeEffect[],
  limit: number = Number.POSITIVE_INFINITY
): CascadeEffect[] {
  return [...cascades].sort((a, b) => b.probability - a.probability).slice(0, limit);
}

const SEVERITY_STEP_DOWN: Record<Severity, Severity> = {
  critical: "high",
  high: "medium",
  medium: "low",
  low: "low",
  info: "info",
};

function cascadeSeverity(rootSeverity: Severity, probability: number): Severity {
  return probability < 0.5 ? SEVERITY_STEP_DOWN[rootSeverity] : rootSeverity;
}

/**
 * Dependents of a node ordered by id, one entry per dependent. Incoming edges
 * are already sorted by source then kind, so the first kind wins.
 */
function dependentsOf(graph: DependencyGraph, nodeId: string): Dependent[] {
  const seen = new Set<string>();
  const result: Dependent[] = [];
  for (const edge of graph.incoming(nodeId)) {
    if (seen.has(edge.source)) continue;
    seen.add(edge.source);
    result.push({ id: edge.source, kind: edge.kind, weight: edge.weight });
  }
  return result;
}

function pruneStrictPrefixes<T extends { path: string[] }>(paths: T[]): T[] {
  return paths.filter(
    (candidate) =>
      !paths.some(
        (other) =>
          other.path.length > candidate.path.length &&
          candidate.path.every((id, i) => other.path[i] === id)
      )
  );
}
