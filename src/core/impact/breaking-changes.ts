/**
 * Breaking-Change Detector
 *
 * Compares entity declarations before and after an edit. Entities are matched
 * by `(kind, qualifiedName)`; a rename therefore shows up as a removal plus an
 * addition.
 *
 * | Transition                      | Change type          | Severity                        |
 * |---------------------------------|----------------------|---------------------------------|
 * | present → absent                | `removed`            | critical if exported, else medium |
 * | absent → present                | `added`              | info                            |
 * | signature fingerprint differs   | `signature_changed`  | high if exported, else low      |
 * | visibility narrows              | `visibility_reduced` | high                            |
 * | visibility widens               | `visibility_widened` | info                            |
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import type { StructuralSummary, Visibility } from "../../utils/validation.js";
import { readSummaries, type Declaration } from "../dependency-graph/summary-reader.js";
import type { ConflictPolicy, GraphDiagnostic } from "../dependency-graph/types.js";
import type { BreakingChange, BreakingChangeReport, ChangeType, Severity } from "./types.js";

const logger = createLogger("breaking-changes");

// =============================================================================
// Visibility
// =============================================================================

const VISIBILITY_RANK: Record<Visibility, number> = {
  private: 0,
  protected: 1,
  internal: 2,
  public: 3,
};

/**
 * Effective visibility rank; an exported entity counts as at least public.
 */
export function visibilityRank(visibility: Visibility, exported: boolean): number {
  const rank = VISIBILITY_RANK[visibility];
  return exported ? Math.max(rank, VISIBILITY_RANK.public) : rank;
}

// =============================================================================
// Mitigations
// =============================================================================

/**
 * Static suggestions per change type.
 */
export function mitigationsFor(changeType: ChangeType, qualifiedName: string): string[] {
  switch (changeType) {
    case "removed":
      return [
        `Consider deprecating '${qualifiedName}' before removing it`,
        "Provide a migration guide and a replacement",
        "Make sure every caller has been updated",
      ];
    case "signature_changed":
      return [
        `Keep a backward-compatible overload of '${qualifiedName}'`,
        "Prefer optional parameters with defaults over new required ones",
        "Migrate callers incrementally",
        "Update related documentation and examples",
      ];
    case "visibility_reduced":
      return [
        `Keep a deprecated re-export of '${qualifiedName}' for one release`,
        "Check the impact on downstream dependents",
      ];
    case "visibility_widened":
      return [`Confirm '${qualifiedName}' is meant to be part of the public surface`];
    case "added":
      return [`Document '${qualifiedName}' and cover it with tests`];
  }
}

// =============================================================================
// Detection
// =============================================================================

export interface BreakingChangeOptions {
  /** Which declaration is compared when an entity is declared twice */
  conflictPolicy?: ConflictPolicy;
}

/**
 * Classifies the API differences between two sets of summaries.
 * Output is sorted by qualified name, kind, then change type.
 */
export function detectBreakingChanges(
  before: readonly StructuralSummary[],
  after: readonly StructuralSummary[],
  options: BreakingChangeOptions = {}
): BreakingChangeReport {
  const policy = options.conflictPolicy ?? "first-wins";
  const diagnostics: GraphDiagnostic[] = [];
  const beforeIndex = indexDeclarations(before, policy, diagnostics);
  const afterIndex = indexDeclarations(after, policy, diagnostics);

  const keys = [...new Set([...beforeIndex.keys(), ...afterIndex.keys()])];
  const changes: BreakingChange[] = [];

  for (const key of keys) {
    const old = beforeIndex.get(key);
    const current = afterIndex.get(key);

    if (old && !current) {
      changes.push(
        createChange("removed", old, old.snippet, null, old.exported ? "critical" : "medium")
      );
    } else if (!old && current) {
      changes.push(createChange("added", current, null, current.snippet, "info"));
    } else if (old && current) {
      changes.push(...compareDeclarations(old, current));
    }
  }

  changes.sort(compareChanges);

  logger.debug(
    { before: beforeIndex.size, after: afterIndex.size, changes: changes.length },
    "Breaking changes detected"
  );

  return { changes, diagnostics };
}

function compareDeclarations(old: Declaration, current: Declaration): BreakingChange[] {
  const changes: BreakingChange[] = [];

  if (old.signature !== null && current.signature !== null && old.signature !== current.signature) {
    changes.push(
      createChange(
        "signature_changed",
        current,
        old.snippet,
        current.snippet,
        old.exported ? "high" : "low"
      )
    );
  }

  const oldRank = visibilityRank(old.visibility, old.exported);
  const newRank = visibilityRank(current.visibility, current.exported);
  if (newRank < oldRank) {
    changes.push(createChange("visibility_reduced", current, old.snippet, current.snippet, "high"));
  } else if (newRank > oldRank) {
    changes.push(createChange("visibility_widened", current, old.snippet, current.snippet, "info"));
  }

  return changes;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Indexes declarations by kind and qualified name. Declarations arrive in
 * canonical order, so the policy picks the same one the graph builder does.
 */
function indexDeclarations(
  summaries: readonly StructuralSummary[],
  policy: ConflictPolicy,
  diagnostics: GraphDiagnostic[]
): Map<string, Declaration> {
  const read = readSummaries(summaries);
  diagnostics.push(...read.diagnostics);

  const index = new Map<string, Declaration>();
  for (const decl of read.declarations) {
    const key = `${decl.kind}\u0000${decl.qualifiedName}`;
    const existing = index.get(key);
    if (existing) {
      const dropped = policy === "first-wins" ? decl : existing;
      diagnostics.push({
        category: "duplicate_entity",
        message: `Duplicate ${decl.kind} "${decl.qualifiedName}" ignored, ${policy === "first-wins" ? "first" : "last"} declaration kept`,
        file: dropped.file,
        index: dropped.declarationIndex,
        qualifiedName: decl.qualifiedName,
      });
      if (policy === "first-wins") continue;
    }
    index.set(key, decl);
  }
  return index;
}

function createChange(
  changeType: ChangeType,
  decl: Declaration,
  before: string | null,
  after: string | null,
  severity: Severity
): BreakingChange {
  return {
    changeType,
    kind: decl.kind,
    qualifiedName: decl.qualifiedName,
    file: decl.file,
    before,
    after,
    severity,
    description: describeChange(changeType, decl, before, after),
    mitigations: mitigationsFor(changeType, decl.qualifiedName),
  };
}

function describeChange(
  changeType: ChangeType,
  decl: Declaration,
  before: string | null,
  after: string | null
): string {
  const subject = `${decl.kind} '${decl.qualifiedName}'`;
  switch (changeType) {
    case "removed":
      return `Removed ${subject}`;
    case "added":
      return `Added ${subject}`;
    case "signature_changed":
      return `Changed signature of ${subject}: ${before ?? "?"} -> ${after ?? "?"}`;
    case "visibility_reduced":
      return `Reduced visibility of ${subject} to ${decl.visibility}`;
    case "visibility_widened":
      return `Widened visibility of ${subject} to ${decl.exported ? "exported" : decl.visibility}`;
  }
}

function compareChanges(a: BreakingChange, b: BreakingChange): number {
  return (
    compareStrings(a.qualifiedName, b.qualifiedName) ||
    compareStrings(a.kind, b.kind) ||
    compareStrings(a.changeType, b.changeType)
  );
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
