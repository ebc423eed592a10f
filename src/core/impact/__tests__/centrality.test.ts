import { describe, it, expect } from "vitest";
import {
  computeCentrality,
  findCriticalPaths,
  identifyCriticalNodes,
  selectCritical,
} from "../centrality.js";
import { buildGraph } from "../../dependency-graph/graph-builder.js";
import { DependencyGraph } from "../../dependency-graph/dependency-graph.js";
import { fn, scenarioA } from "../../../test-utils/fixtures.js";

function sum(values: Iterable<number>): number {
  let total = 0;
  for (const value of values) total += value;
  return total;
}

describe("computeCentrality", () => {
  const graph = buildGraph(scenarioA());
  const id = (name: string): string => graph.getNodeByName(name)?.id ?? name;

  it("should return an empty, converged result for an empty graph", () => {
    const result = computeCentrality(DependencyGraph.empty());
    expect(result.scores.size).toBe(0);
    expect(result.converged).toBe(true);
    expect(result.iterations).toBe(0);
    expect(result.critical).toEqual([]);
  });

  it("should produce scores that sum to one", () => {
    const result = computeCentrality(graph);
    expect(result.converged).toBe(true);
    expect(result.scores.size).toBe(4);
    expect(sum(result.scores.values())).toBeCloseTo(1, 6);
  });

  it("should rank depended-on nodes highest", () => {
    const { scores } = computeCentrality(graph);
    const a = scores.get(id("A")) ?? 0;
    const b = scores.get(id("B")) ?? 0;
    const c = scores.get(id("C")) ?? 0;
    const d = scores.get(id("D")) ?? 0;

    expect(a).toBeGreaterThan(b);
    expect(b).toBeGreaterThan(c);
    expect(c).toBeCloseTo(d, 12);
  });

  it("should flag critical nodes with the sigma method", () => {
    expect(computeCentrality(graph).critical).toEqual([id("A")]);
  });

  it("should flag critical nodes with the percentile method", () => {
    const result = computeCentrality(graph, { critical: { method: "percentile", value: 0.5 } });
    expect(result.critical).toEqual([id("A"), id("B")]);
  });

  it("should report non-convergence without throwing", () => {
    const result = computeCentrality(graph, { maxIterations: 1 });
    expect(result.converged).toBe(false);
    expect(result.iterations).toBe(1);
    expect(result.delta).toBeGreaterThan(1e-6);
    expect(sum(result.scores.values())).toBeCloseTo(1, 6);
  });

  it("should terminate on self-loops", () => {
    const loop = buildGraph([
      {
        file: "src/loop.ts",
        entities: [fn("x"), fn("y")],
        relationships: [
          { from: "x", to: "x", kind: "calls" },
          { from: "x", to: "y", kind: "calls" },
        ],
      },
    ]);
    const result = computeCentrality(loop);

    expect(result.converged).toBe(true);
    expect(sum(result.scores.values())).toBeCloseTo(1, 6);
  });

  it("should give a lone self-looping node the whole rank", () => {
    const loop = buildGraph([
      {
        file: "src/loop.ts",
        entities: [fn("self")],
        relationships: [{ from: "self", to: "self", kind: "calls" }],
      },
    ]);
    const result = computeCentrality(loop);
    expect([...result.scores.values()]).toEqual([1]);
  });

  it("should split rank by edge weight", () => {
    const weighted = buildGraph([
      {
        file: "src/w.ts",
        entities: [fn("s"), fn("heavy"), fn("light")],
        relationships: [
          { from: "s", to: "heavy", kind: "calls" },
          { from: "s", to: "light", kind: "contains" },
        ],
      },
    ]);
    const { scores } = computeCentrality(weighted);
    const heavy = scores.get(weighted.getNodeByName("heavy")?.id ?? "") ?? 0;
    const light = scores.get(weighted.getNodeByName("light")?.id ?? "") ?? 0;

    expect(heavy).toBeGreaterThan(light);
  });

  it("should be reproducible", () => {
    expect(computeCentrality(graph).scores).toEqual(computeCentrality(graph).scores);
  });
});

describe("selectCritical", () => {
  it("should break score ties by id", () => {
    const scores = new Map([
      ["b", 0.4],
      ["a", 0.4],
      ["c", 0.2],
    ]);
    expect(selectCritical(scores, { method: "percentile", value: 0 })).toEqual(["a", "b"]);
  });

  it("should flag nothing when all scores are equal", () => {
    const scores = new Map([
      ["a", 0.5],
      ["b", 0.5],
    ]);
    expect(selectCritical(scores, { method: "sigma", value: 1 })).toEqual([]);
  });
});

describe("critical nodes and paths", () => {
  const graph = buildGraph(scenarioA());
  const id = (name: string): string => graph.getNodeByName(name)?.id ?? name;

  it("should describe critical nodes with fan-in and fan-out", () => {
    const nodes = identifyCriticalNodes(graph, {
      scores: new Map([
        [id("B"), 0.4],
        [id("A"), 0.3],
      ]),
      iterations: 1,
      converged: true,
      delta: 0,
      critical: [id("B"), id("A")],
    });

    expect(nodes).toEqual([
      { id: id("B"), centrality: 0.4, fanIn: 2, fanOut: 1 },
      { id: id("A"), centrality: 0.3, fanIn: 1, fanOut: 0 },
    ]);
  });

  it("should follow dependency chains up to the length limit", () => {
    expect(findCriticalPaths(graph, [id("C")])).toEqual([[id("C"), id("B"), id("A")]]);
    expect(findCriticalPaths(graph, [id("C")], 2)).toEqual([[id("C"), id("B")]]);
  });

  it("should skip nodes without dependencies and unknown ids", () => {
    expect(findCriticalPaths(graph, [id("A"), "missing"])).toEqual([]);
  });
});
