import { describe, it, expect } from "vitest";
import { detectBreakingChanges, mitigationsFor, visibilityRank } from "../breaking-changes.js";
import { fn } from "../../../test-utils/fixtures.js";
import type { StructuralSummary } from "../../../utils/validation.js";

const before: StructuralSummary[] = [
  {
    file: "src/api.ts",
    entities: [
      fn("api.remove", { visibility: "public" }),
      fn("api.internalRemove"),
      fn("api.sig", { visibility: "public", parameters: ["a: string"] }),
      fn("api.privSig", { visibility: "private", signature: "x()" }),
      fn("api.narrow", { visibility: "public" }),
      fn("api.widen", { visibility: "private" }),
      fn("api.both", { visibility: "public", signature: "both()" }),
      fn("api.same", { visibility: "public", signature: "same(a,  b)" }),
      fn("api.expo", { exported: true }),
      fn("api.noSig", { visibility: "public" }),
      { kind: "type", qualifiedName: "api.Thing" },
    ],
  },
];

const after: StructuralSummary[] = [
  {
    file: "src/api.ts",
    entities: [
      fn("api.sig", { visibility: "public", parameters: ["a: string", "b: number"] }),
      fn("api.privSig", { visibility: "private", signature: "x(y)" }),
      fn("api.narrow", { visibility: "internal" }),
      fn("api.widen", { visibility: "protected" }),
      fn("api.both", { visibility: "private", signature: "both(x)" }),
      fn("api.same", { visibility: "public", signature: "same(a, b)" }),
      fn("api.expo"),
      fn("api.noSig", { visibility: "public", signature: "noSig()" }),
      { kind: "interface", qualifiedName: "api.Thing" },
      fn("api.added", { visibility: "public" }),
    ],
  },
];

describe("detectBreakingChanges", () => {
  const { changes, diagnostics } = detectBreakingChanges(before, after);

  it("should classify every transition and sort by name, kind and change type", () => {
    expect(changes.map((c) => [c.qualifiedName, c.kind, c.changeType, c.severity])).toEqual([
      ["api.Thing", "interface", "added", "info"],
      ["api.Thing", "type", "removed", "medium"],
      ["api.added", "function", "added", "info"],
      ["api.both", "function", "signature_changed", "high"],
      ["api.both", "function", "visibility_reduced", "high"],
      ["api.expo", "function", "visibility_reduced", "high"],
      ["api.internalRemove", "function", "removed", "medium"],
      ["api.narrow", "function", "visibility_reduced", "high"],
      ["api.privSig", "function", "signature_changed", "low"],
      ["api.remove", "function", "removed", "critical"],
      ["api.sig", "function", "signature_changed", "high"],
      ["api.widen", "function", "visibility_widened", "info"],
    ]);
    expect(diagnostics).toEqual([]);
  });

  it("should carry before and after snippets", () => {
    const sig = changes.find((c) => c.qualifiedName === "api.sig");
    expect(sig).toMatchObject({
      file: "src/api.ts",
      before: "sig(a: string)",
      after: "sig(a: string, b: number)",
      description: "Changed signature of function 'api.sig': sig(a: string) -> sig(a: string, b: number)",
    });

    const removed = changes.find((c) => c.qualifiedName === "api.remove");
    expect(removed?.before).toBe("remove");
    expect(removed?.after).toBeNull();
  });

  it("should attach static mitigations keyed by change type", () => {
    const removed = changes.find((c) => c.qualifiedName === "api.remove");
    expect(removed?.mitigations).toEqual(mitigationsFor("removed", "api.remove"));
    expect(removed?.mitigations[0]).toBe("Consider deprecating 'api.remove' before removing it");
  });

  it("should return nothing for identical input", () => {
    expect(detectBreakingChanges(before, before)).toEqual({ changes: [], diagnostics: [] });
  });

  it("should return nothing for empty input", () => {
    expect(detectBreakingChanges([], [])).toEqual({ changes: [], diagnostics: [] });
  });

  it("should report duplicates and keep the first declaration", () => {
    const report = detectBreakingChanges(
      [{ file: "src/a.ts", entities: [fn("dup", { visibility: "public" }), fn("dup")] }],
      []
    );
    expect(report.changes.map((c) => [c.changeType, c.severity])).toEqual([["removed", "critical"]]);
    expect(report.diagnostics).toEqual([
      {
        category: "duplicate_entity",
        message: 'Duplicate function "dup" ignored, first declaration kept',
        file: "src/a.ts",
        index: 1,
        qualifiedName: "dup",
      },
    ]);
  });

  it("should compare the last duplicate under last-wins", () => {
    const report = detectBreakingChanges(
      [{ file: "src/a.ts", entities: [fn("f", { signature: "f(a)" }), fn("f", { signature: "f(b)" })] }],
      [{ file: "src/a.ts", entities: [fn("f", { signature: "f(b)" })] }],
      { conflictPolicy: "last-wins" }
    );

    expect(report.changes).toEqual([]);
    expect(report.diagnostics).toEqual([
      {
        category: "duplicate_entity",
        message: 'Duplicate function "f" ignored, last declaration kept',
        file: "src/a.ts",
        index: 0,
        qualifiedName: "f",
      },
    ]);
  });

  it("should skip malformed entities with a diagnostic", () => {
    const report = detectBreakingChanges([], [{ file: "src/a.ts", entities: [fn(""), fn("ok")] }]);
    expect(report.changes.map((c) => c.qualifiedName)).toEqual(["ok"]);
    expect(report.diagnostics.map((d) => [d.category, d.index])).toEqual([["malformed_input", 0]]);
  });
});

describe("visibilityRank", () => {
  it("should order private, protected, internal and public", () => {
    expect(
      (["private", "protected", "internal", "public"] as const).map((v) => visibilityRank(v, false))
    ).toEqual([0, 1, 2, 3]);
  });

  it("should lift exported entities to public", () => {
    expect(visibilityRank("private", true)).toBe(3);
  });
});
