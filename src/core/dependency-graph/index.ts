/**
 * Dependency Graph Module
 *
 * Graph model, summary reading and graph construction.
 *
 * @module
 */

export * from "./types.js";
export { DependencyGraph, compareEdges, edgeKey } from "./dependency-graph.js";
export {
  GraphBuilder,
  buildGraph,
  mergeGraphs,
  type GraphBuildOptions,
  type GraphMergeOptions,
} from "./graph-builder.js";
export {
  readSummaries,
  fingerprint,
  type Declaration,
  type RelationshipRef,
  type ReadSummariesResult,
} from "./summary-reader.js";
export {
  generateNodeId,
  generateExternalId,
  shortName,
  normalizePath,
  isValidNodeId,
} from "./id-generator.js";
