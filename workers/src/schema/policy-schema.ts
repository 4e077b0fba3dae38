/**
 * Loads the target record schema (a JSON Schema subset) once at startup and
 * freezes it into a flattened list of leaf fields addressed by dotted path,
 * e.g. `vehicle.chassisNumber`.
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import { SchemaDefinitionError } from "../errors.js";

export type ScalarType = "string" | "number" | "integer" | "boolean";

export interface ObjectNode {
  type: "object";
  description?: string;
  properties: Record<string, SchemaNode>;
  required?: string[];
}

export interface ScalarNode {
  type: ScalarType;
  description?: string;
  enum?: string[];
}

export interface ArrayNode {
  type: "array";
  description?: string;
  items: SchemaNode;
}

export type SchemaNode = ObjectNode | ScalarNode | ArrayNode;

/** A leaf of the schema tree: a scalar or a sequence. */
export interface FieldSpec {
  path: string;
  segments: readonly string[];
  node: ScalarNode | ArrayNode;
  /** True only when the field and every ancestor are required */
  required: boolean;
}

export interface PolicySchema {
  title: string;
  root: ObjectNode;
  fields: readonly FieldSpec[];
  fieldByPath: ReadonlyMap<string, FieldSpec>;
}

const schemaNodeSchema: z.ZodType<SchemaNode> = z.lazy(() =>
  z.union([
    z.object({
      type: z.literal("object"),
      description: z.string().optional(),
      properties: z.record(z.string(), schemaNodeSchema),
      required: z.array(z.string()).optional(),
    }),
    z.object({
      type: z.literal("array"),
      description: z.string().optional(),
      items: schemaNodeSchema,
    }),
    z.object({
      type: z.enum(["string", "number", "integer", "boolean"]),
      description: z.string().optional(),
      enum: z.array(z.string()).nonempty().optional(),
    }),
  ]),
);

const schemaDocumentSchema = z.object({
  title: z.string().default("PolicyRecord"),
  type: z.literal("object"),
  properties: z.record(z.string(), schemaNodeSchema),
  required: z.array(z.string()).optional(),
});

function checkNode(node: SchemaNode, path: string): void {
  if (node.type === "array") {
    checkNode(node.items, `${path}[]`);
    return;
  }

  if (node.type !== "object") {
    if (node.enum && node.type !== "string") {
      throw new SchemaDefinitionError(
        `${path}: enum is only supported on string fields`,
      );
    }
    return;
  }

  const names = Object.keys(node.properties);
  if (names.length === 0) {
    throw new SchemaDefinitionError(`${path || "root"}: object has no properties`);
  }

  for (const name of names) {
    if (name.includes(".") || name.trim() === "") {
      throw new SchemaDefinitionError(
        `${path || "root"}: invalid property name "${name}"`,
      );
    }
    checkNode(node.properties[name], path ? `${path}.${name}` : name);
  }

  for (const name of node.required ?? []) {
    if (!(name in node.properties)) {
      throw new SchemaDefinitionError(
        `${path || "root"}: required property "${name}" is not declared`,
      );
    }
  }
}

function collectFields(
  node: ObjectNode,
  prefix: string[],
  ancestorsRequired: boolean,
  out: FieldSpec[],
): void {
  const required = new Set(node.required ?? []);

  for (const [name, child] of Object.entries(node.properties)) {
    const segments = [...prefix, name];
    const isRequired = ancestorsRequired && required.has(name);

    if (child.type === "object") {
      collectFields(child, segments, isRequired, out);
    } else {
      out.push({
        path: segments.join("."),
        segments,
        node: child,
        required: isRequired,
      });
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validates a parsed schema document and builds the immutable field index.
 */
export function parsePolicySchema(document: unknown): PolicySchema {
  const parsed = schemaDocumentSchema.safeParse(document);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new SchemaDefinitionError(
      `Malformed schema at ${first.path.join(".") || "root"}: ${first.message}`,
      parsed.error,
    );
  }

  const root: ObjectNode = {
    type: "object",
    properties: parsed.data.properties,
    required: parsed.data.required,
  };
  checkNode(root, "");

  const fields: FieldSpec[] = [];
  collectFields(root, [], true, fields);

  return deepFreeze({
    title: parsed.data.title,
    root,
    fields,
    fieldByPath: new Map(fields.map((field) => [field.path, field])),
  });
}

export async function loadPolicySchema(path: string): Promise<PolicySchema> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    throw new SchemaDefinitionError(`Cannot read schema file ${path}`, error);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new SchemaDefinitionError(`Schema file ${path} is not valid JSON`, error);
  }

  const schema = parsePolicySchema(document);
  console.log(
    `[PolicySchema] Loaded ${schema.title} with ${schema.fields.length} fields from ${path}`,
  );
  return schema;
}
