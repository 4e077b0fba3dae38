/**
 * SchemaNormalizer
 *
 * Shapes the merged field map into the schema's nested record. Every
 * declared leaf is present in the output: values that could not be cast
 * become null with an error entry, and required leaves nobody supplied
 * become null and are listed as missing. Never throws on data.
 */

import type { FieldSpec, PolicySchema } from "../schema/policy-schema.js";
import type {
  ChunkFailure,
  FieldError,
  MergedRecord,
  PolicyRecord,
  ValidatedRecord,
} from "../types.js";
import { REDACTED } from "./field-merge.js";
import { coerceValue } from "./coerce.js";

/**
 * Nested record from leaf values, with intermediate objects created in
 * schema order.
 */
function buildRecord(leaves: ReadonlyArray<[FieldSpec, unknown]>): PolicyRecord {
  const root: PolicyRecord = {};
  const objects = new Map<string, PolicyRecord>();

  for (const [field, value] of leaves) {
    let parent = root;
    let prefix = "";
    for (const segment of field.segments.slice(0, -1)) {
      prefix = prefix ? `${prefix}.${segment}` : segment;
      let child = objects.get(prefix);
      if (!child) {
        child = {};
        objects.set(prefix, child);
        parent[segment] = child;
      }
      parent = child;
    }
    parent[field.segments[field.segments.length - 1]] = value;
  }

  return root;
}

export class SchemaNormalizer {
  constructor(private schema: PolicySchema) {}

  normalize(
    merged: MergedRecord,
    failedChunks: readonly ChunkFailure[] = [],
  ): ValidatedRecord {
    const errors: FieldError[] = [];
    const missingFields: string[] = [];
    const leaves: Array<[FieldSpec, unknown]> = [];
    let populated = 0;

    for (const field of this.schema.fields) {
      const candidate = merged.get(field.path);

      if (!candidate) {
        if (field.required) missingFields.push(field.path);
        leaves.push([field, null]);
        continue;
      }

      if (candidate.value === REDACTED) {
        populated++;
        leaves.push([field, REDACTED]);
        continue;
      }

      const result = coerceValue(field.node, candidate.value);
      if (result.ok) {
        populated++;
        leaves.push([field, result.value]);
      } else {
        errors.push(Object.freeze({ field: field.path, reason: result.reason }));
        leaves.push([field, null]);
      }
    }

    const isValid =
      errors.length === 0 &&
      missingFields.length === 0 &&
      failedChunks.length === 0;

    console.log(
      `[SchemaNormalizer] ${populated}/${this.schema.fields.length} fields populated, ` +
        `${errors.length} error(s), ${missingFields.length} missing`,
    );

    return {
      data: buildRecord(leaves),
      report: Object.freeze({
        isValid,
        errors: Object.freeze(errors),
        missingFields: Object.freeze(missingFields),
        failedChunks: Object.freeze([...failedChunks]),
      }),
    };
  }
}
