/**
 * Change Impact Engine
 *
 * Measures the architectural blast radius of a code change from structural
 * summaries of the code before and after the edit.
 *
 * @module
 */

export * from "./core/index.js";
export * from "./types/result.js";
export {
  SummaryEntitySchema,
  SummaryRelationshipSchema,
  StructuralSummaryEnvelopeSchema,
  EntityKindSchema,
  VisibilitySchema,
  RelationshipKindSchema,
  type StructuralSummary,
  type SummaryEntity,
  type SummaryRelationship,
  type EntityKind,
  type Visibility,
  type RelationshipKind,
} from "./utils/validation.js";
export { createLogger, type Logger, type LogLevel } from "./utils/logger.js";
