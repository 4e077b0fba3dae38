import prettier from "@prettier/sync";
import type { PolicySchema, SchemaNode } from "../../schema/policy-schema.js";

function format(source: string): string {
  return prettier.format(source, { parser: "typescript" });
}

/**
 * Render the policy schema document as a TypeScript interface, so every
 * extraction prompt shows the model the exact nesting and field names.
 */
export function policySchemaToTs(schema: PolicySchema, name: string): string {
  return format(`interface ${name} ${printSchemaNode(schema.root)}`);
}

function printSchemaNode(node: SchemaNode): string {
  switch (node.type) {
    case "string":
      return node.enum
        ? node.enum.map((o) => JSON.stringify(o)).join(" | ")
        : "string";
    case "number":
    case "integer":
      return "number";
    case "boolean":
      return "boolean";
    case "array": {
      const item = printSchemaNode(node.items);
      return item.includes("|") ? `(${item})[]` : `${item}[]`;
    }
    case "object": {
      const required = new Set(node.required ?? []);
      const lines = Object.entries(node.properties).map(([key, child]) => {
        const doc = child.description ? `/** ${child.description} */\n` : "";
        const optional = required.has(key) ? "" : "?";
        return `${doc}${key}${optional}: ${printSchemaNode(child)};`;
      });
      return `{\n${lines.join("\n")}\n}`;
    }
  }
}
