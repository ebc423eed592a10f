import { describe, it, expect } from "vitest";
import { detectCascades, rankCascades } from "../cascade-detector.js";
import { detectBreakingChanges } from "../breaking-changes.js";
import { buildGraph } from "../../dependency-graph/graph-builder.js";
import type { DependencyGraph } from "../../dependency-graph/dependency-graph.js";
import { fn, scenarioA, scenarioAWithoutA } from "../../../test-utils/fixtures.js";
import type { BreakingChange, ChangeType } from "../types.js";

function change(qualifiedName: string, changeType: ChangeType = "removed"): BreakingChange {
  return {
    changeType,
    kind: "function",
    qualifiedName,
    file: "src/chain.ts",
    before: null,
    after: null,
    severity: "high",
    description: `${changeType} ${qualifiedName}`,
    mitigations: [],
  };
}

/** n1 calls n0, n2 depends on n1, n3 calls n2 */
function chain(exported: string[] = []): DependencyGraph {
  return buildGraph([
    {
      file: "src/chain.ts",
      entities: ["n0", "n1", "n2", "n3"].map((name) =>
        fn(name, exported.includes(name) ? { visibility: "public" } : {})
      ),
      relationships: [
        { from: "n1", to: "n0", kind: "calls" },
        { from: "n2", to: "n1", kind: "dependsOn" },
        { from: "n3", to: "n2", kind: "calls" },
      ],
    },
  ]);
}

function names(graph: DependencyGraph, path: string[]): string[] {
  return path.map((id) => graph.getNode(id)?.qualifiedName ?? id);
}

describe("detectCascades", () => {
  describe("Scenario A", () => {
    const graph = buildGraph(scenarioA());
    const { changes } = detectBreakingChanges(scenarioA(), scenarioAWithoutA());
    const cascades = detectCascades(graph, changes);

    it("should detect the removal of A as the only change", () => {
      expect(changes.map((c) => [c.qualifiedName, c.changeType, c.severity])).toEqual([
        ["A", "removed", "critical"],
      ]);
    });

    it("should find the chains A-B-C and A-B-D", () => {
      expect(cascades.map((c) => names(graph, c.path)).sort()).toEqual([
        ["A", "B", "C"],
        ["A", "B", "D"],
      ]);
      for (const cascade of cascades) {
        expect(cascade.edgeKinds).toEqual(["calls", "calls"]);
        expect(cascade.terminal).toBe("public_api_exposure");
        expect(cascade.rootChange.qualifiedName).toBe("A");
      }
    });

    it("should carry the path probability and the root severity", () => {
      for (const cascade of cascades) {
        expect(cascade.probability).toBeCloseTo(0.85 * 0.85, 10);
        expect(cascade.severity).toBe("critical");
      }
    });

    it("should order dependents by id", () => {
      const leaves = cascades.map((c) => c.path[2] ?? "");
      expect(leaves).toEqual([...leaves].sort());
    });
  });

  it("should never repeat a node in a path", () => {
    const graph = buildGraph([
      {
        file: "src/cycle.ts",
        entities: [fn("x"), fn("y", { visibility: "public" }), fn("z", { visibility: "public" })],
        relationships: [
          { from: "y", to: "x", kind: "calls" },
          { from: "x", to: "y", kind: "calls" },
          { from: "z", to: "y", kind: "calls" },
          { from: "x", to: "z", kind: "calls" },
        ],
      },
    ]);
    const cascades = detectCascades(graph, [change("x")]);

    expect(cascades.map((c) => names(graph, c.path))).toEqual([["x", "y", "z"]]);
    for (const cascade of cascades) {
      expect(new Set(cascade.path).size).toBe(cascade.path.length);
    }
  });

  it("should record depth-limited paths when dependents remain unexplored", () => {
    const graph = chain();
    const cascades = detectCascades(graph, [change("n0", "signature_changed")], { maxDepth: 2 });

    expect(cascades).toHaveLength(1);
    expect(names(graph, cascades[0]?.path ?? [])).toEqual(["n0", "n1", "n2"]);
    expect(cascades[0]?.edgeKinds).toEqual(["calls", "dependsOn"]);
    expect(cascades[0]?.terminal).toBe("depth_limited");
  });

  it("should record nothing when the chain ends inside internal code", () => {
    expect(detectCascades(chain(), [change("n0")])).toEqual([]);
  });

  it("should stop at nodes carrying another breaking change", () => {
    const graph = chain(["n3"]);
    const cascades = detectCascades(graph, [change("n0"), change("n2", "visibility_reduced")]);

    expect(cascades.map((c) => [names(graph, c.path), c.terminal, c.rootChange.qualifiedName])).toEqual([
      [["n0", "n1", "n2"], "compound_break", "n0"],
      [["n2", "n3"], "public_api_exposure", "n2"],
    ]);
  });

  it("should prune paths that prefix a longer recorded path", () => {
    const graph = chain(["n1", "n2"]);
    const cascades = detectCascades(graph, [change("n0")]);

    expect(cascades.map((c) => names(graph, c.path))).toEqual([["n0", "n1", "n2"]]);
  });

  it("should ignore changes that cannot break dependents", () => {
    const graph = chain(["n1"]);
    expect(detectCascades(graph, [change("n0", "added"), change("n0", "visibility_widened")])).toEqual([]);
  });

  it("should ignore changes without a graph node", () => {
    expect(detectCascades(chain(["n1"]), [change("ghost")])).toEqual([]);
  });

  describe("probability and severity", () => {
    it("should multiply weighted hop retention along the path", () => {
      const graph = chain(["n3"]);
      const cascades = detectCascades(graph, [change("n0")]);

      expect(cascades.map((c) => names(graph, c.path))).toEqual([["n0", "n1", "n2", "n3"]]);
      // calls 1.0, dependsOn 0.8, calls 1.0
      expect(cascades[0]?.probability).toBeCloseTo(0.85 * 0.8 * 0.85 * 0.85, 10);
    });

    it("should lower the severity of unlikely paths by one step", () => {
      const cascades = detectCascades(chain(["n3"]), [change("n0")]);
      expect(cascades[0]?.severity).toBe("medium");
    });

    it("should drop unlikely paths before pruning prefixes", () => {
      const graph = chain(["n1", "n3"]);

      expect(detectCascades(graph, [change("n0")]).map((c) => names(graph, c.path))).toEqual([
        ["n0", "n1", "n2", "n3"],
      ]);
      expect(
        detectCascades(graph, [change("n0")], { minProbability: 0.5 }).map((c) => names(graph, c.path))
      ).toEqual([["n0", "n1"]]);
    });

    it("should drop paths shorter than the minimum length", () => {
      const graph = chain(["n1"]);

      expect(detectCascades(graph, [change("n0")]).map((c) => names(graph, c.path))).toEqual([["n0", "n1"]]);
      expect(detectCascades(graph, [change("n0")], { minLength: 3 })).toEqual([]);
    });
  });

  describe("rankCascades", () => {
    const graph = buildGraph([
      {
        file: "src/fan.ts",
        entities: [fn("hub"), fn("viaDep", { visibility: "public" }), fn("viaCall", { visibility: "public" })],
        relationships: [
          { from: "viaDep", to: "hub", kind: "dependsOn" },
          { from: "viaCall", to: "hub", kind: "calls" },
        ],
      },
    ]);
    const cascades = detectCascades(graph, [change("hub")]);

    it("should order cascades by descending probability", () => {
      expect(rankCascades(cascades).map((c) => names(graph, c.path))).toEqual([
        ["hub", "viaCall"],
        ["hub", "viaDep"],
      ]);
    });

    it("should keep at most the requested number", () => {
      expect(rankCascades(cascades, 1).map((c) => names(graph, c.path))).toEqual([["hub", "viaCall"]]);
      expect(cascades).toHaveLength(2);
    });
  });

  it("should cap the number of explored paths", () => {
    const graph = buildGraph([
      {
        file: "src/star.ts",
        entities: [fn("hub"), ...["s1", "s2", "s3", "s4"].map((name) => fn(name, { visibility: "public" }))],
        relationships: ["s1", "s2", "s3", "s4"].map((name) => ({
          from: name,
          to: "hub",
          kind: "calls" as const,
        })),
      },
    ]);

    expect(detectCascades(graph, [change("hub")])).toHaveLength(4);
    expect(detectCascades(graph, [change("hub")], { maxCascadePaths: 2 })).toHaveLength(2);
  });
});
