/**
 * Validation Suite: sentinel classification and chunk merge
 */

import { describe, it, expect } from "vitest";
import { classifyValue, mergeResults } from "./field-merge.js";
import { parseExtractionResponse } from "./response-parser.js";
import { parsePolicySchema } from "../schema/policy-schema.js";
import type { RawExtractionResult } from "../types.js";

function result(
  chunkIndex: number,
  fields: Record<string, unknown> | null,
): RawExtractionResult {
  return { chunkIndex, fields, parseError: null, attempts: 1 };
}

describe("classifyValue", () => {
  it.each([null, undefined, "", "  ", "N/A", "null", "Unknown", "UNKNOWN - not shown", [], {}])(
    "should treat %j as empty",
    (value) => {
      expect(classifyValue(value)).toBe("empty");
    },
  );

  it.each(["REDACTED", "[REDACTED]", "redacted", "REDACTED (masked)"])(
    "should treat %j as redacted",
    (value) => {
      expect(classifyValue(value)).toBe("redacted");
    },
  );

  it.each(["Toyota", "Nil", 0, false, ["Chan"], { a: 1 }])(
    "should treat %j as a value",
    (value) => {
      expect(classifyValue(value)).toBe("value");
    },
  );
});

describe("mergeResults", () => {
  it("should keep the first chunk's value", () => {
    const merged = mergeResults([
      result(0, { "vehicle.make": "Toyota" }),
      result(1, { "vehicle.make": "Honda" }),
    ]);

    expect(merged.get("vehicle.make")).toEqual({ value: "Toyota", chunkIndex: 0 });
  });

  it("should skip sentinels so a later chunk can fill the field", () => {
    const merged = mergeResults([
      result(0, { "vehicle.make": "UNKNOWN", "vehicle.model": null }),
      result(1, { "vehicle.make": "Honda" }),
    ]);

    expect(merged.get("vehicle.make")).toEqual({ value: "Honda", chunkIndex: 1 });
    expect(merged.has("vehicle.model")).toBe(false);
  });

  it("should let a later REDACTED marker override an earlier value", () => {
    const merged = mergeResults([
      result(0, { "policyholder.idNumber": "A123456(7)" }),
      result(1, { "policyholder.idNumber": "[REDACTED]" }),
    ]);

    expect(merged.get("policyholder.idNumber")).toEqual({
      value: "REDACTED",
      chunkIndex: 1,
    });
  });

  it("should keep a Nil value from an earlier chunk", () => {
    const merged = mergeResults([
      result(0, { "coverage.excess": "Nil" }),
      result(1, { "coverage.excess": "HKD 2,000" }),
    ]);

    expect(merged.get("coverage.excess")).toEqual({ value: "Nil", chunkIndex: 0 });
  });

  it("should let a later redacted group override earlier leaf values", () => {
    const schema = parsePolicySchema({
      type: "object",
      properties: {
        policyholder: {
          type: "object",
          properties: {
            name: { type: "string" },
            address: { type: "string" },
          },
        },
      },
    });
    const fieldsOf = (content: string) => {
      const parsed = parseExtractionResponse(content, schema);
      return parsed.status === "failed" ? null : parsed.fields;
    };

    const merged = mergeResults([
      result(0, fieldsOf('{"policyholder.name": "Chan Tai Man"}')),
      result(1, fieldsOf('{"policyholder": "REDACTED"}')),
    ]);

    expect(merged.get("policyholder.name")).toEqual({
      value: "REDACTED",
      chunkIndex: 1,
    });
    expect(merged.get("policyholder.address")).toEqual({
      value: "REDACTED",
      chunkIndex: 1,
    });
  });

  it("should never override an earlier REDACTED marker", () => {
    const merged = mergeResults([
      result(0, { "policyholder.idNumber": "REDACTED" }),
      result(1, { "policyholder.idNumber": "A123456(7)" }),
      result(2, { "policyholder.idNumber": "REDACTED" }),
    ]);

    expect(merged.get("policyholder.idNumber")).toEqual({
      value: "REDACTED",
      chunkIndex: 0,
    });
  });

  it("should merge by chunk index regardless of arrival order", () => {
    const merged = mergeResults([
      result(2, { "vehicle.make": "Mazda" }),
      result(1, null),
      result(0, { "vehicle.make": "Toyota" }),
    ]);

    expect(merged.get("vehicle.make")).toEqual({ value: "Toyota", chunkIndex: 0 });
  });
});
