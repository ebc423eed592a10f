/**
 * Runtime Validation Schemas
 *
 * Zod schemas for the structural summaries fed into the engine by external,
 * language-aware extractors. Each entity and relationship is validated on its
 * own so one bad entry never rejects a whole summary.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Entity Kinds & Visibility
// =============================================================================

/**
 * Kinds an extractor may declare. `external` is reserved for synthetic nodes.
 */
export const EntityKindSchema = z.enum(["function", "type", "interface", "module"]);

export type EntityKind = z.infer<typeof EntityKindSchema>;

export const VisibilitySchema = z.enum(["public", "internal", "protected", "private"]);

export type Visibility = z.infer<typeof VisibilitySchema>;

export const RelationshipKindSchema = z.enum(["calls", "contains", "implements", "dependsOn"]);

export type RelationshipKind = z.infer<typeof RelationshipKindSchema>;

// =============================================================================
// Location Schema
// =============================================================================

export const SummaryLocationSchema = z
  .object({
    startLine: z.number().int().positive(),
    endLine: z.number().int().positive(),
  })
  .refine((data) => data.endLine >= data.startLine, {
    message: "endLine must be >= startLine",
  });

// =============================================================================
// Entity & Relationship Schemas
// =============================================================================

export const SummaryEntitySchema = z.object({
  kind: EntityKindSchema,
  qualifiedName: z.string().trim().min(1),
  visibility: VisibilitySchema.default("internal"),
  /** Defaults to `visibility === "public"` when omitted */
  exported: z.boolean().optional(),
  signature: z.string().optional(),
  parameters: z.array(z.string()).optional(),
  returnType: z.string().optional(),
  location: SummaryLocationSchema.optional(),
  /** Qualified name of the lexical container */
  parent: z.string().min(1).optional(),
  implements: z.array(z.string().min(1)).optional(),
  extends: z.array(z.string().min(1)).optional(),
});

export type SummaryEntity = z.input<typeof SummaryEntitySchema>;

export const SummaryRelationshipSchema = z.object({
  from: z.string().trim().min(1),
  to: z.string().trim().min(1),
  kind: RelationshipKindSchema,
});

export type SummaryRelationship = z.infer<typeof SummaryRelationshipSchema>;

// =============================================================================
// Structural Summary Schema
// =============================================================================

/**
 * Envelope of a summary. Entries are kept as `unknown` here and validated one
 * at a time by {@link SummaryEntitySchema} and {@link SummaryRelationshipSchema}.
 */
export const StructuralSummaryEnvelopeSchema = z.object({
  file: z.string().trim().min(1),
  language: z.string().optional(),
  entities: z.array(z.unknown()).default([]),
  relationships: z.array(z.unknown()).default([]),
});

export interface StructuralSummary {
  /** Source file (or diff hunk) the summary describes */
  file: string;
  language?: string;
  entities: SummaryEntity[];
  relationships?: SummaryRelationship[];
}

/**
 * Formats zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
