import {describe, expect, it} from "vitest";
import {z} from "zod";
import {extractSchemaInfo, validateSchemaExists, validateZodTypeCompatibility} from "./schema-validator.js";

describe("extractSchemaInfo", () => {
  it("unwraps optional, default and nullable wrappers", () => {
    expect(extractSchemaInfo(z.number().optional())).toEqual({type: "number", optional: true, nullable: false});
    expect(extractSchemaInfo(z.number().default(1))).toEqual({type: "number", optional: true, nullable: false});
    expect(extractSchemaInfo(z.string().nullable())).toEqual({type: "string", optional: false, nullable: true});
  });

  it("looks through refinements", () => {
    expect(extractSchemaInfo(z.number().refine((n) => n > 0)).type).toBe("number");
  });

  it("describes nested structure", () => {
    const info = extractSchemaInfo(z.object({tags: z.array(z.string()), mode: z.enum(["fast", "slow"])}));

    expect(info.type).toBe("object");
    expect(info.properties?.tags.element?.type).toBe("string");
    expect(info.properties?.mode.enum).toEqual(["fast", "slow"]);
  });
});

describe("validateZodTypeCompatibility", () => {
  it("accepts identical primitive types", () => {
    expect(validateZodTypeCompatibility(z.number(), z.number())).toEqual({
      compatible: true,
      warnings: [],
      errors: [],
    });
  });

  it("rejects different primitive types", () => {
    const result = validateZodTypeCompatibility(z.string(), z.number());

    expect(result.compatible).toBe(false);
    expect(result.errors).toEqual([
      "Incompatible types: Output type 'string' is not compatible with input type 'number'",
    ]);
  });

  it("accepts anything into an unknown input", () => {
    expect(validateZodTypeCompatibility(z.string(), z.unknown()).compatible).toBe(true);
  });

  it("warns when an optional output feeds a required input", () => {
    const result = validateZodTypeCompatibility(z.number().optional(), z.number());

    expect(result.compatible).toBe(true);
    expect(result.warnings).toEqual(["Output is optional but input is required"]);
  });

  it("does not warn when the input has a default", () => {
    expect(validateZodTypeCompatibility(z.number().optional(), z.number().default(0)).warnings).toEqual([]);
  });

  it("rejects a nullable output into a non-nullable input", () => {
    const result = validateZodTypeCompatibility(z.string().nullable(), z.string());

    expect(result.compatible).toBe(false);
    expect(result.errors).toEqual(["Output can be null but input does not accept null"]);
  });

  it("compares enum value sets", () => {
    expect(validateZodTypeCompatibility(z.enum(["a", "b"]), z.enum(["a", "b", "c"])).warnings).toEqual([]);
    expect(validateZodTypeCompatibility(z.enum(["a", "z"]), z.enum(["a", "b"])).warnings).toEqual([
      "Output can produce values the input does not accept",
    ]);

    const disjoint = validateZodTypeCompatibility(z.enum(["x"]), z.enum(["a"]));
    expect(disjoint.compatible).toBe(false);
    expect(disjoint.errors).toEqual(["Output and input value sets have no common values"]);
  });

  it("lets enums and literals feed a string input", () => {
    expect(validateZodTypeCompatibility(z.enum(["a"]), z.string()).compatible).toBe(true);
    expect(validateZodTypeCompatibility(z.literal("a"), z.string()).compatible).toBe(true);
    expect(validateZodTypeCompatibility(z.literal("a"), z.enum(["a", "b"])).compatible).toBe(true);
  });

  it("warns about union options the input does not accept", () => {
    const result = validateZodTypeCompatibility(z.union([z.string(), z.number()]), z.string());

    expect(result.compatible).toBe(true);
    expect(result.warnings).toEqual(["Output option 'number' is not accepted by input"]);
  });

  it("requires every required object property", () => {
    const result = validateZodTypeCompatibility(
      z.object({a: z.number()}),
      z.object({a: z.number(), b: z.string()})
    );

    expect(result.compatible).toBe(false);
    expect(result.errors).toEqual(["Required input property 'b' is not provided by output schema"]);
  });

  it("reports array element mismatches", () => {
    const result = validateZodTypeCompatibility(z.array(z.number()), z.array(z.string()));

    expect(result.compatible).toBe(false);
    expect(result.errors).toEqual([
      "Array element type incompatibility: number is not compatible with string",
      "Incompatible types: Output type 'number' is not compatible with input type 'string'",
    ]);
  });
});

describe("validateSchemaExists", () => {
  it("warns about a missing schema", () => {
    expect(validateSchemaExists(undefined, "node 'scale' input 'x'").warnings).toEqual([
      "node 'scale' input 'x' has no schema defined",
    ]);
  });

  it("warns about schemas with no inspectable structure", () => {
    expect(validateSchemaExists(z.function(), "node 'scale' input 'fn'").warnings).toEqual([
      "Schema for node 'scale' input 'fn' is of unknown type and may not work as expected",
    ]);
  });

  it("accepts a structured schema silently", () => {
    expect(validateSchemaExists(z.string(), "node 'scale' input 'x'").warnings).toEqual([]);
  });
});
