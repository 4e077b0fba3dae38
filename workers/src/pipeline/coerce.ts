/**
 * Casts extracted values to the declared schema types.
 */

import type { ObjectNode, SchemaNode } from "../schema/policy-schema.js";
import { REDACTED, classifyValue } from "./field-merge.js";

export type Coerced =
  | { ok: true; value: unknown }
  | { ok: false; reason: string };

const NUMBER = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;
const NUMBER_NOISE = /HKD|HK\$|\$|,|\s/gi;
const TRUE_WORDS = new Set(["true", "yes", "y"]);
const FALSE_WORDS = new Set(["false", "no", "n"]);
const NIL = /^\s*nil\s*$/i;

function ok(value: unknown): Coerced {
  return { ok: true, value };
}

function fail(reason: string): Coerced {
  return { ok: false, reason };
}

function show(value: unknown): string {
  return typeof value === "string" ? `"${value}"` : JSON.stringify(value);
}

function toNumber(value: unknown): Coerced {
  if (typeof value === "number") {
    return Number.isFinite(value) ? ok(value) : fail("expected a finite number");
  }
  if (typeof value === "string") {
    if (NIL.test(value)) return ok(0);
    const cleaned = value.replace(NUMBER_NOISE, "").replace(/%$/, "");
    if (NUMBER.test(cleaned)) return ok(Number(cleaned));
  }
  return fail(`cannot parse ${show(value)} as a number`);
}

function toString(node: { enum?: string[] }, value: unknown): Coerced {
  if (typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
    return fail(`expected a string, got ${Array.isArray(value) ? "an array" : typeof value}`);
  }
  const text = String(value).trim();
  if (!node.enum) return ok(text);

  const match = node.enum.find((option) => option.toLowerCase() === text.toLowerCase());
  return match !== undefined
    ? ok(match)
    : fail(`${show(text)} is not one of ${node.enum.map((o) => `"${o}"`).join(", ")}`);
}

function toBoolean(value: unknown): Coerced {
  if (typeof value === "boolean") return ok(value);
  if (typeof value === "string") {
    const word = value.trim().toLowerCase();
    if (TRUE_WORDS.has(word)) return ok(true);
    if (FALSE_WORDS.has(word)) return ok(false);
  }
  return fail(`cannot parse ${show(value)} as a boolean`);
}

function toArray(items: SchemaNode, value: unknown): Coerced {
  if (typeof value === "string" && NIL.test(value)) return ok([]);

  const raw: unknown[] = Array.isArray(value)
    ? value
    : typeof value === "string"
      ? value.split(",")
      : [value];

  const coerced: unknown[] = [];
  for (const [i, item] of raw.entries()) {
    if (classifyValue(item) === "empty") continue;
    const result = coerceValue(items, item);
    if (!result.ok) return fail(`item ${i}: ${result.reason}`);
    coerced.push(result.value);
  }
  return ok(coerced);
}

function toObject(node: ObjectNode, value: unknown): Coerced {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return fail(`expected an object, got ${show(value)}`);
  }

  const source = new Map(Object.entries(value));
  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(node.properties)) {
    const result = coerceValue(child, source.get(key));
    if (!result.ok) return fail(`${key}: ${result.reason}`);
    out[key] = result.value;
  }
  return ok(out);
}

/**
 * Sentinels become null and redaction markers "REDACTED" for any type;
 * everything else is cast or rejected with a reason.
 */
export function coerceValue(node: SchemaNode, value: unknown): Coerced {
  const kind = classifyValue(value);
  if (kind === "empty") return ok(null);
  if (kind === "redacted") return ok(REDACTED);

  switch (node.type) {
    case "string":
      return toString(node, value);
    case "number":
      return toNumber(value);
    case "integer": {
      const result = toNumber(value);
      if (result.ok && !Number.isInteger(result.value)) {
        return fail(`expected an integer, got ${show(result.value)}`);
      }
      return result;
    }
    case "boolean":
      return toBoolean(value);
    case "array":
      return toArray(node.items, value);
    case "object":
      return toObject(node, value);
  }
}
