/**
 * Node ID Generator
 *
 * Generates deterministic IDs for graph nodes.
 *
 * Declared entities are keyed by where they were declared: the file and the
 * position of the entity inside that file's summary, plus its kind and
 * qualified name. Feeding the same summaries always yields the same IDs, and
 * two different entities can never share one even when graphs built from
 * different snapshots of the same file are merged.
 *
 * ID Format: SHA-256 hash truncated to 16 hex chars
 *
 * @module
 */

import { createHash } from "node:crypto";

// =============================================================================
// Core ID Generation
// =============================================================================

/**
 * Generates the ID of a declared entity.
 *
 * @param filePath - File the summary describes
 * @param declarationIndex - Position of the entity in the summary
 * @param kind - Entity kind
 * @param qualifiedName - Fully qualified entity name
 */
export function generateNodeId(
  filePath: string,
  declarationIndex: number,
  kind: string,
  qualifiedName: string
): string {
  return hashToId(`${normalizePath(filePath)}#${declarationIndex}:${kind}:${qualifiedName}`);
}

/**
 * Generates the ID of a synthetic external node.
 * External IDs depend only on the unresolved name.
 */
export function generateExternalId(name: string): string {
  return hashToId(`external:${name}`);
}

// =============================================================================
// Name Helpers
// =============================================================================

/**
 * Last segment of a qualified name.
 *
 * @example
 * shortName("billing.Invoice.total") // => "total"
 * shortName("crate::net::connect")   // => "connect"
 * shortName("src/user.ts#validate")  // => "validate"
 */
export function shortName(qualifiedName: string): string {
  const segments = qualifiedName.split(/::|[.#/\\]/).filter((s) => s.length > 0);
  return segments[segments.length - 1] ?? qualifiedName;
}

export function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, "/");
}

// =============================================================================
// Internal Helpers
// =============================================================================

function hashToId(input: string): string {
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

/**
 * Validates that a string is a valid node ID (16 lowercase hex characters).
 */
export function isValidNodeId(id: string): boolean {
  return /^[a-f0-9]{16}$/.test(id);
}
