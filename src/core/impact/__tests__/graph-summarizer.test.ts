import { describe, it, expect } from "vitest";
import { estimateTokens, renderRecord, summarizeGraph } from "../graph-summarizer.js";
import { computeCentrality } from "../centrality.js";
import { propagateImpact } from "../impact-propagation.js";
import { buildGraph } from "../../dependency-graph/graph-builder.js";
import { DependencyGraph } from "../../dependency-graph/dependency-graph.js";
import { scenarioA } from "../../../test-utils/fixtures.js";

describe("summarizeGraph", () => {
  const graph = buildGraph(scenarioA());
  const id = (name: string): string => graph.getNodeByName(name)?.id ?? name;
  const centrality = computeCentrality(graph).scores;
  const impact = propagateImpact(graph, [id("A")], { maxDepth: 2 });
  const tenTokens = (): number => 10;

  it("should rank by combined centrality and impact", () => {
    const summary = summarizeGraph(graph, { centrality, impact });
    const tail = [id("C"), id("D")].sort();

    expect(summary.selected.map((e) => e.id)).toEqual([id("A"), id("B"), ...tail]);
    expect(summary.selected[0]?.score).toBeCloseTo(1, 10);
    expect(summary.selected[0]?.impact).toBe(1);
    expect(summary.truncated).toBe(false);
    expect(summary.omittedCount).toBe(0);
    expect(summary.totalCandidates).toBe(4);
  });

  it("should truncate at topK and say so", () => {
    const summary = summarizeGraph(graph, { centrality, impact }, { topK: 2 });

    expect(summary.selected.map((e) => e.id)).toEqual([id("A"), id("B")]);
    expect(summary.truncated).toBe(true);
    expect(summary.omittedCount).toBe(2);
  });

  it("should stop when the token budget is reached", () => {
    const summary = summarizeGraph(
      graph,
      { centrality, impact },
      { tokenBudget: 25, estimateTokens: tenTokens }
    );

    expect(summary.selected).toHaveLength(2);
    expect(summary.budgetUsed).toBe(20);
    expect(summary.budgetTotal).toBe(25);
    expect(summary.truncated).toBe(true);
    expect(summary.omittedCount).toBe(2);
  });

  it("should always admit the first record, overshooting by at most one record", () => {
    const summary = summarizeGraph(
      graph,
      { centrality, impact },
      { tokenBudget: 5, estimateTokens: tenTokens }
    );

    expect(summary.selected.map((e) => e.id)).toEqual([id("A")]);
    expect(summary.budgetUsed).toBe(10);
    expect(summary.budgetUsed - summary.budgetTotal).toBeLessThanOrEqual(10);
    expect(summary.omittedCount).toBe(3);
  });

  it("should estimate tokens from the rendered record by default", () => {
    const summary = summarizeGraph(graph, { centrality, impact });
    const first = summary.selected[0];

    expect(first?.record).toBe("function A @ src/scenario.ts A(): void");
    expect(first?.tokens).toBe(Math.ceil("function A @ src/scenario.ts A(): void".length / 4));
    expect(estimateTokens("abcde")).toBe(2);
  });

  it("should honor summary weights", () => {
    const summary = summarizeGraph(
      graph,
      { centrality, impact },
      { summaryWeights: { centrality: 1, impact: 0 } }
    );
    expect(summary.selected[0]?.id).toBe(id("A"));
    expect(summary.selected[1]?.id).toBe(id("B"));
    expect(summary.selected[1]?.score).toBeCloseTo(2.7 / 3.295, 3);
  });

  it("should rank by centrality alone without an impact scope", () => {
    const summary = summarizeGraph(graph, { centrality });
    expect(summary.selected[0]?.impact).toBe(0);
    expect(summary.selected[0]?.score).toBeCloseTo(0.5, 10);
  });

  it("should produce stable output", () => {
    const options = { tokenBudget: 30, estimateTokens: tenTokens };
    expect(summarizeGraph(graph, { centrality, impact }, options)).toEqual(
      summarizeGraph(graph, { centrality, impact }, options)
    );
  });

  it("should summarize an empty graph", () => {
    expect(summarizeGraph(DependencyGraph.empty(), { centrality: new Map() })).toEqual({
      selected: [],
      truncated: false,
      omittedCount: 0,
      budgetUsed: 0,
      budgetTotal: 4000,
      totalCandidates: 0,
    });
  });
});

describe("renderRecord", () => {
  it("should include line numbers when known", () => {
    const graph = buildGraph([
      {
        file: "src/a.ts",
        entities: [{ kind: "type", qualifiedName: "a.T", location: { startLine: 3, endLine: 9 } }],
      },
    ]);
    const node = graph.getNodeByName("a.T");
    expect(node ? renderRecord(node) : "").toBe("type a.T @ src/a.ts:3");
  });
});
