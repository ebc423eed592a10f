/**
 * Structural Summary Reader
 *
 * Validates summaries entry by entry and flattens them into declarations and
 * relationship references. Shared by the graph builder and the breaking-change
 * detector so both see the same normalized entities.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import {
  StructuralSummaryEnvelopeSchema,
  SummaryEntitySchema,
  SummaryRelationshipSchema,
  formatIssues,
  type EntityKind,
  type RelationshipKind,
  type StructuralSummary,
  type Visibility,
} from "../../utils/validation.js";
import { err, ok, partition, type Result } from "../../types/result.js";
import { normalizePath, shortName } from "./id-generator.js";
import type { GraphDiagnostic, NodeLocation } from "./types.js";

const logger = createLogger("summary-reader");

// =============================================================================
// Types
// =============================================================================

/**
 * A validated entity together with where it was declared.
 */
export interface Declaration {
  file: string;
  declarationIndex: number;
  kind: EntityKind;
  qualifiedName: string;
  name: string;
  visibility: Visibility;
  exported: boolean;
  /** Normalized fingerprint; null when the extractor gave no signature data */
  signature: string | null;
  /** Human-readable signature for reports */
  snippet: string;
  location: NodeLocation | null;
  parent: string | null;
  implementsNames: string[];
}

/**
 * A relationship whose endpoints are still names, resolved later in scope of
 * `file`.
 */
export interface RelationshipRef {
  file: string;
  index: number;
  from: string;
  to: string;
  kind: RelationshipKind;
}

export interface ReadSummariesResult {
  declarations: Declaration[];
  relationships: RelationshipRef[];
  diagnostics: GraphDiagnostic[];
}

// =============================================================================
// Reader
// =============================================================================

/**
 * Reads summaries in file order. Input order does not affect the output:
 * summaries of the same file (e.g. one per diff hunk) are ordered by content.
 */
export function readSummaries(summaries: readonly StructuralSummary[]): ReadSummariesResult {
  const declarations: Declaration[] = [];
  const relationships: RelationshipRef[] = [];
  const diagnostics: GraphDiagnostic[] = [];

  const envelopes = summaries
    .flatMap((raw, position) => {
      const parsed = StructuralSummaryEnvelopeSchema.safeParse(raw);
      if (!parsed.success) {
        diagnostics.push({
          category: "malformed_input",
          message: `Summary #${position} skipped: ${formatIssues(parsed.error).join("; ")}`,
          index: position,
        });
        return [];
      }
      const envelope = { ...parsed.data, file: normalizePath(parsed.data.file) };
      return [{ envelope, key: canonicalJson(envelope) }];
    })
    .sort((a, b) => compareStrings(a.envelope.file, b.envelope.file) || compareStrings(a.key, b.key));

  for (const { envelope } of envelopes) {
    const entityResults = envelope.entities.map((entry, index) =>
      readEntity(entry, envelope.file, index)
    );
    const { oks, errs } = partition(entityResults);
    declarations.push(...oks);
    diagnostics.push(...errs);

    envelope.relationships.forEach((entry, index) => {
      const parsed = SummaryRelationshipSchema.safeParse(entry);
      if (!parsed.success) {
        diagnostics.push({
          category: "malformed_input",
          message: `Relationship skipped: ${formatIssues(parsed.error).join("; ")}`,
          file: envelope.file,
          index,
        });
        return;
      }
      relationships.push({ file: envelope.file, index, ...parsed.data });
    });
  }

  if (diagnostics.length > 0) {
    logger.debug({ diagnostics: diagnostics.length }, "Skipped malformed summary entries");
  }

  return { declarations, relationships, diagnostics };
}

function readEntity(entry: unknown, file: string, index: number): Result<Declaration, GraphDiagnostic> {
  const parsed = SummaryEntitySchema.safeParse(entry);
  if (!parsed.success) {
    return err<GraphDiagnostic>({
      category: "malformed_input",
      message: `Entity skipped: ${formatIssues(parsed.error).join("; ")}`,
      file,
      index,
    });
  }

  const entity = parsed.data;
  const name = shortName(entity.qualifiedName);
  return ok({
    file,
    declarationIndex: index,
    kind: entity.kind,
    qualifiedName: entity.qualifiedName,
    name,
    visibility: entity.visibility,
    exported: entity.exported ?? entity.visibility === "public",
    signature: fingerprint(entity.signature, entity.parameters, entity.returnType),
    snippet: snippet(name, entity.signature, entity.parameters, entity.returnType),
    location: entity.location
      ? { startLine: entity.location.startLine, endLine: entity.location.endLine }
      : null,
    parent: entity.parent ?? null,
    implementsNames: [...(entity.implements ?? []), ...(entity.extends ?? [])],
  });
}

/**
 * JSON with object keys sorted at every level; undefined members are dropped.
 */
function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const members = Object.entries(value)
      .filter(([, member]) => member !== undefined)
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([name, member]) => `${JSON.stringify(name)}:${canonicalJson(member)}`);
    return `{${members.join(",")}}`;
  }
  return value === undefined ? "null" : JSON.stringify(value);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// =============================================================================
// Signature Helpers
// =============================================================================

/**
 * Builds a whitespace-insensitive fingerprint of the signature data.
 */
export function fingerprint(
  signature: string | undefined,
  parameters: string[] | undefined,
  returnType: string | undefined
): string | null {
  if (signature === undefined && parameters === undefined && returnType === undefined) {
    return null;
  }
  const parts = [collapse(signature ?? "")];
  if (parameters !== undefined) parts.push(`(${parameters.map(collapse).join(",")})`);
  if (returnType !== undefined) parts.push(`=>${collapse(returnType)}`);
  return parts.join("|");
}

function snippet(
  name: string,
  signature: string | undefined,
  parameters: string[] | undefined,
  returnType: string | undefined
): string {
  if (signature !== undefined && signature.trim().length > 0) return collapse(signature);
  const params = parameters ? `(${parameters.join(", ")})` : "";
  const ret = returnType ? `: ${returnType}` : "";
  return `${name}${params}${ret}`;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
