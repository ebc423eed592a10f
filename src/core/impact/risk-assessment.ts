/**
 * Risk Assessment
 *
 * Rolls breaking changes up into an overall level, a 0-100 score and a
 * de-duplicated list of recommendations.
 *
 * @module
 */

import type { BreakingChange, CascadeEffect, RiskAssessment, RiskLevel, Severity } from "./types.js";

const SEVERITY_ORDER: readonly Severity[] = ["critical", "high", "medium", "low", "info"];

/** (score, weight) per severity */
const SEVERITY_SCORES: Record<Severity, readonly [number, number]> = {
  critical: [90, 10],
  high: [70, 8],
  medium: [40, 5],
  low: [15, 2],
  info: [0, 1],
};

/**
 * Weighted average of per-change scores, rounded down and capped at 100.
 */
export function calculateRiskScore(changes: readonly BreakingChange[]): number {
  let total = 0;
  let weights = 0;
  for (const change of changes) {
    const [score, weight] = SEVERITY_SCORES[change.severity];
    total += score * weight;
    weights += weight;
  }
  return weights === 0 ? 0 : Math.min(100, Math.floor(total / weights));
}

function scoreBandAdvice(score: number): string[] {
  if (score >= 70) {
    return [
      "Run a full integration test pass",
      "Prepare a detailed rollback plan",
      "Consider a staged rollout",
    ];
  }
  if (score >= 40) {
    return ["Increase unit test coverage around the change", "Update related documentation and API notes"];
  }
  if (score >= 15) {
    return ["Confirm the change behaves as intended", "Consider updating usage examples"];
  }
  return [];
}

export function assessRisk(
  changes: readonly BreakingChange[],
  cascades: readonly CascadeEffect[] = []
): RiskAssessment {
  const counts: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  for (const change of changes) {
    counts[change.severity]++;
  }

  const level: RiskLevel = SEVERITY_ORDER.find((severity) => counts[severity] > 0) ?? "none";
  const score = calculateRiskScore(changes);

  const recommendations = new Set<string>(scoreBandAdvice(score));
  if (cascades.some((cascade) => cascade.terminal === "public_api_exposure")) {
    recommendations.add("Notify consumers of the affected public API");
  }
  for (const change of changes) {
    for (const mitigation of change.mitigations) {
      recommendations.add(mitigation);
    }
  }

  return {
    level,
    score,
    counts,
    recommendations: [...recommendations],
    headline: headline(level, score, changes.length, cascades.length),
  };
}

function headline(level: RiskLevel, score: number, changeCount: number, cascadeCount: number): string {
  if (changeCount === 0) return "No architectural risk detected";
  const changes = `${changeCount} change${changeCount === 1 ? "" : "s"}`;
  const cascades = `${cascadeCount} cascade${cascadeCount === 1 ? "" : "s"}`;
  return `Risk ${level} (${score}/100): ${changes}, ${cascades}`;
}
