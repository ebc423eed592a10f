/**
 * Shared test fixtures
 */

import type { StructuralSummary, SummaryEntity } from "../utils/validation.js";

export function fn(qualifiedName: string, overrides: Partial<SummaryEntity> = {}): SummaryEntity {
  return { kind: "function", qualifiedName, ...overrides };
}

export const SCENARIO_FILE = "src/scenario.ts";

/**
 * B calls A; C and D call B. A, C and D are exported, B is internal.
 */
export function scenarioA(): StructuralSummary[] {
  return [
    {
      file: SCENARIO_FILE,
      entities: [
        fn("A", { visibility: "public", signature: "A(): void" }),
        fn("B", { signature: "B(): void" }),
        fn("C", { visibility: "public", signature: "C(): void" }),
        fn("D", { visibility: "public", signature: "D(): void" }),
      ],
      relationships: [
        { from: "B", to: "A", kind: "calls" },
        { from: "C", to: "B", kind: "calls" },
        { from: "D", to: "B", kind: "calls" },
      ],
    },
  ];
}

/**
 * Scenario A after `A` was deleted.
 */
export function scenarioAWithoutA(): StructuralSummary[] {
  return [
    {
      file: SCENARIO_FILE,
      entities: [
        fn("B", { signature: "B(): void" }),
        fn("C", { visibility: "public", signature: "C(): void" }),
        fn("D", { visibility: "public", signature: "D(): void" }),
      ],
      relationships: [
        { from: "B", to: "A", kind: "calls" },
        { from: "C", to: "B", kind: "calls" },
        { from: "D", to: "B", kind: "calls" },
      ],
    },
  ];
}
