/**
 * Sentinel rules and the cross-chunk merge.
 *
 * A value is "empty" when the model signalled it knows nothing (null, "",
 * "UNKNOWN", "N/A", empty array/object) and "redacted" when the document
 * deliberately hides it. Per field, the earliest chunk with a real value
 * wins; a REDACTED marker replaces an earlier guess and is never replaced.
 */

import type { MergeCandidate, MergedRecord, RawExtractionResult } from "../types.js";

export const REDACTED = "REDACTED";

export type ValueClass = "empty" | "redacted" | "value";

// "Nil" is a real value on schedules (Nil excess); coercion reads it per type
const EMPTY_STRINGS = new Set(["", "N/A", "NA", "NULL", "NONE", "-"]);

export function classifyValue(value: unknown): ValueClass {
  if (value === null || value === undefined) return "empty";

  if (typeof value === "string") {
    const normalized = value.trim().toUpperCase();
    if (EMPTY_STRINGS.has(normalized) || normalized.startsWith("UNKNOWN")) {
      return "empty";
    }
    if (normalized === "[REDACTED]" || normalized.startsWith(REDACTED)) {
      return "redacted";
    }
    return "value";
  }

  if (Array.isArray(value)) return value.length === 0 ? "empty" : "value";
  if (typeof value === "object") {
    return Object.keys(value).length === 0 ? "empty" : "value";
  }
  return "value";
}

/**
 * Merge chunk results in chunk-index order, whatever order they arrived in.
 * Fields no chunk supplied are absent from the result.
 */
export function mergeResults(results: readonly RawExtractionResult[]): MergedRecord {
  const merged = new Map<string, MergeCandidate>();
  const ordered = [...results].sort((a, b) => a.chunkIndex - b.chunkIndex);

  for (const result of ordered) {
    if (!result.fields) continue;

    for (const [path, value] of Object.entries(result.fields)) {
      const kind = classifyValue(value);
      if (kind === "empty") continue;

      const existing = merged.get(path);
      if (existing?.value === REDACTED) continue;
      if (existing && kind === "value") continue;

      merged.set(path, {
        value: kind === "redacted" ? REDACTED : value,
        chunkIndex: result.chunkIndex,
      });
    }
  }

  return merged;
}
