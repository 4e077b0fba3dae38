/**
 * Turns a completion response into a flat field-path -> value mapping.
 */

import type { PolicySchema } from "../schema/policy-schema.js";
import { REDACTED, classifyValue } from "./field-merge.js";

export type ParsedResponse =
  | { status: "ok"; fields: Record<string, unknown> }
  | { status: "partial"; fields: Record<string, unknown>; error: string }
  | { status: "failed"; error: string };

const FENCE = /```(?:json|typescript)?\s*([\s\S]*?)```/;
const KEY_VALUE_LINE = /^\s*(?:[-*]\s*)?"?([A-Za-z_][\w.]*)"?\s*:\s*(.*?)\s*,?\s*$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(text);
    return isPlainObject(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * JSON object in the response: a fenced block, the whole text, or the
 * outermost braces when the model wrapped the object in prose.
 */
export function extractJsonObject(content: string): Record<string, unknown> | null {
  const fenced = content.match(FENCE);
  const candidate = fenced ? fenced[1].trim() : content.trim();

  const direct = tryParseObject(candidate);
  if (direct) return direct;

  const open = candidate.indexOf("{");
  const close = candidate.lastIndexOf("}");
  return open >= 0 && close > open
    ? tryParseObject(candidate.slice(open, close + 1))
    : null;
}

function isGroupRedacted(value: unknown, depth: number, segments: readonly string[]) {
  return depth < segments.length - 1 && classifyValue(value) === "redacted";
}

function lookupNested(
  object: Record<string, unknown>,
  segments: readonly string[],
): unknown {
  let value: unknown = object;
  for (const [depth, segment] of segments.entries()) {
    if (!isPlainObject(value)) return undefined;
    value = value[segment];
    if (isGroupRedacted(value, depth, segments)) return REDACTED;
  }
  return value;
}

function lookupDotted(
  object: Record<string, unknown>,
  segments: readonly string[],
): unknown {
  const exact = object[segments.join(".")];
  if (exact !== undefined) return exact;

  for (let depth = 0; depth < segments.length - 1; depth++) {
    const group = object[segments.slice(0, depth + 1).join(".")];
    if (isGroupRedacted(group, depth, segments)) return REDACTED;
  }
  return undefined;
}

/**
 * Leaf values addressed by schema path. Accepts the nested shape and,
 * as a fallback, top-level dotted keys. A group given as a redaction
 * marker (`{"policyholder": "REDACTED"}`) redacts every leaf under it.
 */
export function flattenFields(
  object: Record<string, unknown>,
  schema: PolicySchema,
): Record<string, unknown> {
  const fields: Record<string, unknown> = {};

  for (const field of schema.fields) {
    let value = lookupNested(object, field.segments);
    if (value === undefined) value = lookupDotted(object, field.segments);
    if (value !== undefined) fields[field.path] = value;
  }

  return fields;
}

function salvageValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function salvageKeyValues(
  content: string,
  schema: PolicySchema,
): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const line of content.split("\n")) {
    const match = line.match(KEY_VALUE_LINE);
    if (match && schema.fieldByPath.has(match[1]) && !(match[1] in fields)) {
      fields[match[1]] = salvageValue(match[2]);
    }
  }
  return fields;
}

export function parseExtractionResponse(
  content: string,
  schema: PolicySchema,
): ParsedResponse {
  const object = extractJsonObject(content);
  if (object) {
    return { status: "ok", fields: flattenFields(object, schema) };
  }

  const salvaged = salvageKeyValues(content, schema);
  const count = Object.keys(salvaged).length;
  if (count > 0) {
    return {
      status: "partial",
      fields: salvaged,
      error: `Response was not valid JSON; salvaged ${count} field(s) from key/value lines`,
    };
  }

  return { status: "failed", error: "Response contained no JSON object" };
}
