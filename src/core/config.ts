/**
 * Analysis Configuration
 *
 * A single validated configuration value for one analysis run. Every numeric
 * parameter is checked up front; an invalid value rejects the whole run before
 * any graph is built.
 *
 * @module
 */

import { z } from "zod";
import { ConfigurationError, ErrorCode } from "./errors.js";
import { err, ok, type Result } from "../types/result.js";
import { formatIssues } from "../utils/validation.js";
import { DEFAULT_EDGE_WEIGHTS } from "./dependency-graph/types.js";

// =============================================================================
// Schema
// =============================================================================

const weight = z.number().finite().nonnegative();

export const EdgeWeightsSchema = z.object({
  calls: weight.default(DEFAULT_EDGE_WEIGHTS.calls),
  contains: weight.default(DEFAULT_EDGE_WEIGHTS.contains),
  implements: weight.default(DEFAULT_EDGE_WEIGHTS.implements),
  dependsOn: weight.default(DEFAULT_EDGE_WEIGHTS.dependsOn),
});

/**
 * Critical-node threshold.
 *
 * - `sigma`: score > mean + value × standard deviation
 * - `percentile`: score > the score at quantile `value` (0..1)
 */
export const CriticalThresholdSchema = z.discriminatedUnion("method", [
  z.object({ method: z.literal("sigma"), value: z.number().finite().nonnegative().default(1) }),
  z.object({ method: z.literal("percentile"), value: z.number().min(0).max(1).default(0.9) }),
]);

export type CriticalThreshold = z.infer<typeof CriticalThresholdSchema>;

export const SummaryWeightsSchema = z
  .object({
    centrality: weight.default(0.5),
    impact: weight.default(0.5),
  })
  .refine((data) => data.centrality + data.impact > 0, {
    message: "centrality and impact weights cannot both be 0",
  });

export const AnalysisConfigSchema = z.object({
  // Centrality
  dampingFactor: z.number().gt(0).lt(1).default(0.85),
  epsilon: z.number().positive().default(1e-6),
  maxIterations: z.number().int().min(1).default(100),
  critical: CriticalThresholdSchema.default({ method: "sigma", value: 1 }),

  // Propagation
  decayFactor: z.number().gt(0).max(1).default(0.7),
  maxDepth: z.number().int().min(0).default(4),
  highImpactThreshold: z.number().gt(0).max(1).default(0.5),
  maxCascadePaths: z.number().int().min(1).default(500),
  minCascadeProbability: z.number().min(0).max(1).default(0),
  /** Nodes per cascade path, root included */
  minCascadeLength: z.number().int().min(2).default(2),

  // Graph
  edgeWeights: EdgeWeightsSchema.default({}),
  conflictPolicy: z.enum(["first-wins", "last-wins"]).default("first-wins"),

  // Summary
  topK: z.number().int().min(1).default(200),
  tokenBudget: z.number().int().positive().default(4000),
  summaryWeights: SummaryWeightsSchema.default({}),

  // Batch
  concurrency: z.number().int().min(1).default(4),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;

export const DEFAULT_ANALYSIS_CONFIG: Readonly<AnalysisConfig> = Object.freeze(
  AnalysisConfigSchema.parse({})
);

// =============================================================================
// Resolution
// =============================================================================

/**
 * Validates and fills in defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function resolveAnalysisConfig(input: AnalysisConfigInput = {}): AnalysisConfig {
  const result = tryResolveAnalysisConfig(input);
  if (!result.ok) throw result.error;
  return result.value;
}

export function tryResolveAnalysisConfig(
  input: AnalysisConfigInput = {}
): Result<AnalysisConfig, ConfigurationError> {
  const parsed = AnalysisConfigSchema.safeParse(input);
  if (parsed.success) return ok(parsed.data);

  const issues = formatIssues(parsed.error);
  return err(
    new ConfigurationError(
      `Invalid analysis configuration (${issues.length} issue${issues.length === 1 ? "" : "s"})`,
      issues,
      ErrorCode.CONFIG_OUT_OF_RANGE
    )
  );
}
