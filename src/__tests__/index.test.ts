import { describe, it, expect } from "vitest";
import * as engine from "../index.js";
import { createLogger } from "../utils/logger.js";

describe("public API", () => {
  it("should expose the analysis entry points", () => {
    expect(typeof engine.analyzeChange).toBe("function");
    expect(typeof engine.analyzeMany).toBe("function");
    expect(typeof engine.buildGraph).toBe("function");
    expect(typeof engine.mergeGraphs).toBe("function");
    expect(engine.DEFAULT_ANALYSIS_CONFIG.maxDepth).toBe(4);
  });

  it("should validate summaries with the exported schemas", () => {
    expect(engine.SummaryEntitySchema.safeParse({ kind: "function", qualifiedName: "a" }).success).toBe(true);
    expect(engine.SummaryEntitySchema.safeParse({ kind: "class", qualifiedName: "a" }).success).toBe(false);
  });

  it("should run a full analysis through the package entry", () => {
    const result = engine.analyzeChange({
      before: [{ file: "src/a.ts", entities: [{ kind: "function", qualifiedName: "a", visibility: "public" }] }],
      after: [],
    });
    expect(result.risk.level).toBe("critical");
  });
});

describe("createLogger", () => {
  it("should be silent under test by default", () => {
    expect(createLogger("test").level).toBe("silent");
  });

  it("should honor an explicit level", () => {
    expect(createLogger("test", { level: "warn" }).level).toBe("warn");
  });

  it("should bind the component on a child of the shared root", () => {
    const logger = createLogger("graph-builder", { level: "warn" });
    expect(logger.bindings()).toMatchObject({ component: "graph-builder" });
    expect(createLogger("centrality").bindings()).toMatchObject({ component: "centrality" });
  });
});
