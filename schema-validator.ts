/**
 * @file schema-validator.ts
 * @description Checks whether values described by one Zod schema can be fed to
 *              a port described by another. Used when wiring edges.
 */

import {z} from 'zod';

/**
 * Result of schema validation
 */
export type ValidationResult = {
  /**
   * Whether the schemas are compatible
   */
  compatible: boolean;
  /**
   * Array of warning messages
   */
  warnings: string[];
  /**
   * Array of error messages
   */
  errors: string[];
};

/**
 * Information about a schema structure
 */
export type SchemaInfo = {
  /**
   * The base type (string, number, object, array, etc.)
   */
  type: string;
  /**
   * Whether the schema accepts `undefined` (optional or defaulted)
   */
  optional: boolean;
  /**
   * Whether the schema is nullable
   */
  nullable: boolean;
  properties?: Record<string, SchemaInfo>;
  element?: SchemaInfo;
  union?: SchemaInfo[];
  enum?: unknown[];
  literal?: unknown;
};

function emptyResult(): ValidationResult {
  return {compatible: true, warnings: [], errors: []};
}

function merge(into: ValidationResult, from: ValidationResult): void {
  into.warnings.push(...from.warnings);
  into.errors.push(...from.errors);
  if (!from.compatible) {
    into.compatible = false;
  }
}

/**
 * Extracts schema information from a Zod schema
 */
export function extractSchemaInfo(schema: z.ZodTypeAny): SchemaInfo {
  const plain = (type: string): SchemaInfo => ({type, optional: false, nullable: false});

  if (schema instanceof z.ZodOptional) {
    return {...extractSchemaInfo(schema.unwrap()), optional: true};
  }
  if (schema instanceof z.ZodDefault) {
    return {...extractSchemaInfo(schema.removeDefault()), optional: true};
  }
  if (schema instanceof z.ZodNullable) {
    return {...extractSchemaInfo(schema.unwrap()), nullable: true};
  }
  if (schema instanceof z.ZodEffects) {
    return extractSchemaInfo(schema.innerType());
  }

  if (schema instanceof z.ZodString) return plain("string");
  if (schema instanceof z.ZodNumber) return plain("number");
  if (schema instanceof z.ZodBigInt) return plain("bigint");
  if (schema instanceof z.ZodBoolean) return plain("boolean");
  if (schema instanceof z.ZodDate) return plain("date");
  if (schema instanceof z.ZodAny) return plain("any");
  if (schema instanceof z.ZodUnknown) return plain("unknown");
  if (schema instanceof z.ZodVoid) return plain("void");
  if (schema instanceof z.ZodUndefined) return {type: "undefined", optional: true, nullable: false};
  if (schema instanceof z.ZodNull) return {type: "null", optional: false, nullable: true};

  if (schema instanceof z.ZodArray) {
    return {...plain("array"), element: extractSchemaInfo(schema.element)};
  }
  if (schema instanceof z.ZodObject) {
    const properties: Record<string, SchemaInfo> = {};
    const shape: z.ZodRawShape = schema.shape;
    for (const [key, value] of Object.entries(shape)) {
      properties[key] = extractSchemaInfo(value);
    }
    return {...plain("object"), properties};
  }
  if (schema instanceof z.ZodUnion) {
    const options: readonly z.ZodTypeAny[] = schema.options;
    return {...plain("union"), union: options.map(extractSchemaInfo)};
  }
  if (schema instanceof z.ZodEnum) {
    const values: readonly string[] = schema.options;
    return {...plain("enum"), enum: [...values]};
  }
  if (schema instanceof z.ZodLiteral) {
    const value: unknown = schema.value;
    return {...plain("literal"), literal: value};
  }
  if (schema instanceof z.ZodRecord || schema instanceof z.ZodMap) {
    return plain("object");
  }
  // z.custom / z.instanceof and the rest carry no structure we can inspect
  return plain("unknown");
}

/**
 * Type a literal value would have as a plain schema.
 */
function literalBaseType(value: unknown): string {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return typeof value;
  }
  return "unknown";
}

/**
 * Checks if two basic types are compatible
 */
function areBasicTypesCompatible(output: SchemaInfo, input: SchemaInfo): boolean {
  const outputType = output.type;
  const inputType = input.type;

  if (
    outputType === "any" ||
    inputType === "any" ||
    outputType === "unknown" ||
    inputType === "unknown"
  ) {
    return true;
  }

  // union options are checked one by one by the caller
  if (outputType === "union" || inputType === "union") {
    return true;
  }

  if (outputType === inputType) {
    return true;
  }

  const valueSets = ["enum", "literal"];
  if (valueSets.includes(outputType) && valueSets.includes(inputType)) {
    return true;
  }
  if (outputType === "enum") {
    return inputType === "string";
  }
  if (outputType === "literal") {
    return literalBaseType(output.literal) === inputType;
  }
  if (inputType === "literal" || inputType === "enum") {
    // a wider output may still carry the accepted values
    return outputType === "string" || outputType === literalBaseType(input.literal);
  }

  return false;
}

function validateObjectCompatibility(output: SchemaInfo, input: SchemaInfo): ValidationResult {
  const result = emptyResult();
  const outputProps = output.properties ?? {};
  const inputProps = input.properties ?? {};

  for (const [key, inputProp] of Object.entries(inputProps)) {
    const outputProp = outputProps[key];
    if (!outputProp) {
      if (inputProp.optional) {
        result.warnings.push(`Optional input property '${key}' is not provided by output schema`);
      } else {
        result.errors.push(`Required input property '${key}' is not provided by output schema`);
        result.compatible = false;
      }
      continue;
    }

    const propResult = validateSchemaCompatibility(outputProp, inputProp);
    if (!propResult.compatible) {
      result.errors.push(`Property '${key}' has incompatible types: output is ${outputProp.type}, input is ${inputProp.type}`);
    }
    merge(result, propResult);
  }

  for (const key of Object.keys(outputProps)) {
    if (!inputProps[key]) {
      result.warnings.push(`Output property '${key}' is not used by input schema`);
    }
  }

  return result;
}

function validateArrayCompatibility(output: SchemaInfo, input: SchemaInfo): ValidationResult {
  const result = emptyResult();
  if (!output.element || !input.element) {
    result.warnings.push("Array element schema not available for detailed validation");
    return result;
  }

  const elementResult = validateSchemaCompatibility(output.element, input.element);
  if (!elementResult.compatible) {
    result.errors.push(
      `Array element type incompatibility: ${output.element.type} is not compatible with ${input.element.type}`
    );
  }
  merge(result, elementResult);
  return result;
}

function validateEnumCompatibility(output: SchemaInfo, input: SchemaInfo): ValidationResult {
  const result = emptyResult();
  const outputValues = output.type === "literal" ? [output.literal] : output.enum ?? [];
  const inputValues = input.type === "literal" ? [input.literal] : input.enum ?? [];

  const common = outputValues.filter((value) => inputValues.includes(value));
  if (common.length === 0) {
    result.errors.push("Output and input value sets have no common values");
    result.compatible = false;
    return result;
  }

  if (common.length !== outputValues.length) {
    result.warnings.push("Output can produce values the input does not accept");
  }
  return result;
}

function validateUnionCompatibility(output: SchemaInfo, input: SchemaInfo): ValidationResult {
  const result = emptyResult();
  const outputOptions = output.union ?? [output];
  const inputOptions = input.union ?? [input];

  // every output option needs somewhere to land
  let matched = 0;
  for (const outputOption of outputOptions) {
    const accepted = inputOptions.some(
      (inputOption) => validateSchemaCompatibility(outputOption, inputOption).compatible
    );
    if (accepted) {
      matched++;
    } else {
      result.warnings.push(`Output option '${outputOption.type}' is not accepted by input`);
    }
  }

  if (matched === 0) {
    result.errors.push(`No compatible option between output '${output.type}' and input '${input.type}'`);
    result.compatible = false;
  }
  return result;
}

/**
 * Validates compatibility between two schemas
 */
function validateSchemaCompatibility(output: SchemaInfo, input: SchemaInfo): ValidationResult {
  const result = emptyResult();

  if (output.type === "void" || output.type === "undefined") {
    if (!input.optional) {
      result.errors.push("Output is void/undefined but input is required");
      result.compatible = false;
    }
    return result;
  }

  if (output.nullable && !input.nullable) {
    result.errors.push("Output can be null but input does not accept null");
    result.compatible = false;
  }

  if (output.optional && !input.optional) {
    result.warnings.push("Output is optional but input is required");
  }

  if (output.type === "union" || input.type === "union") {
    merge(result, validateUnionCompatibility(output, input));
    return result;
  }

  if (!areBasicTypesCompatible(output, input)) {
    result.errors.push(
      `Incompatible types: Output type '${output.type}' is not compatible with input type '${input.type}'`
    );
    result.compatible = false;
    return result;
  }

  switch (input.type) {
    case "object":
      if (output.type === "object" && output.properties && input.properties) {
        merge(result, validateObjectCompatibility(output, input));
      }
      break;
    case "array":
      if (output.type === "array") {
        merge(result, validateArrayCompatibility(output, input));
      }
      break;
    case "enum":
    case "literal":
      if (output.type === "enum" || output.type === "literal") {
        merge(result, validateEnumCompatibility(output, input));
      }
      break;
  }

  return result;
}

/**
 * Main function to validate compatibility between two Zod schemas
 * @param outputSchema - Schema of the value being produced
 * @param inputSchema - Schema of the port receiving it
 */
export function validateZodTypeCompatibility(
  outputSchema: z.ZodTypeAny,
  inputSchema: z.ZodTypeAny
): ValidationResult {
  return validateSchemaCompatibility(
    extractSchemaInfo(outputSchema),
    extractSchemaInfo(inputSchema),
  );
}

/**
 * Reports schemas that cannot be checked structurally.
 * @param context - Context for messages (e.g., "node 'scale' input 'x'")
 */
export function validateSchemaExists(
  schema: z.ZodTypeAny | undefined,
  context: string
): ValidationResult {
  const result = emptyResult();

  if (!schema) {
    result.warnings.push(`${context} has no schema defined`);
    return result;
  }

  if (extractSchemaInfo(schema).type === "unknown") {
    result.warnings.push(`Schema for ${context} is of unknown type and may not work as expected`);
  }

  return result;
}
