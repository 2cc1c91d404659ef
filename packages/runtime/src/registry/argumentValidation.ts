import type { JSONSchemaProperty, JSONSchemaType } from "../types/index.js";

type PathSegment = string | number;

/**
 * 用工具声明的 JSON schema 校验模型给出的参数。
 * 只覆盖工具 schema 常用的子集：type、enum、oneOf、properties、required、
 * additionalProperties、items。返回第一条错误，全部通过时返回 null。
 */
export function validateToolArguments(
  args: unknown,
  schema: JSONSchemaProperty
): string | null {
  return validateValue(args, schema, []);
}

function validateValue(
  value: unknown,
  schema: JSONSchemaProperty,
  path: PathSegment[]
): string | null {
  if (schema.oneOf && schema.oneOf.length > 0) {
    const matches = schema.oneOf.some(
      (option) => validateValue(value, option, path) === null
    );
    if (matches) {
      return null;
    }
    return `Invalid value for ${formatPath(path)}: does not match any allowed schema`;
  }

  if (schema.enum && schema.enum.length > 0) {
    if (typeof value !== "string" || !schema.enum.includes(value)) {
      return `Invalid value for ${formatPath(path)}: expected one of ${schema.enum.join(", ")}`;
    }
  }

  const expectedType = resolveExpectedType(schema);
  if (!expectedType) {
    return null;
  }

  if (expectedType === "object") {
    return validateObject(value, schema, path);
  }

  if (expectedType === "array") {
    return validateArray(value, schema, path);
  }

  if (!checkType(value, expectedType)) {
    return invalidTypeMessage(path, expectedType);
  }

  return null;
}

function resolveExpectedType(schema: JSONSchemaProperty): JSONSchemaType | undefined {
  if (schema.type) {
    return schema.type;
  }
  if (schema.items) {
    return "array";
  }
  if (schema.properties || schema.required) {
    return "object";
  }
  return undefined;
}

function validateObject(
  value: unknown,
  schema: JSONSchemaProperty,
  path: PathSegment[]
): string | null {
  if (!isRecord(value)) {
    return invalidTypeMessage(path, "object");
  }

  for (const field of schema.required ?? []) {
    if (!(field in value)) {
      return `Missing required argument: ${formatPath([...path, field])}`;
    }
  }

  const properties = schema.properties ?? {};
  if (schema.additionalProperties === false) {
    for (const key of Object.keys(value)) {
      if (!(key in properties)) {
        return `Unexpected argument: ${formatPath([...path, key])}`;
      }
    }
  }

  for (const [key, propSchema] of Object.entries(properties)) {
    if (!(key in value)) {
      continue;
    }
    const error = validateValue(value[key], propSchema, [...path, key]);
    if (error) {
      return error;
    }
  }
  return null;
}

function validateArray(
  value: unknown,
  schema: JSONSchemaProperty,
  path: PathSegment[]
): string | null {
  if (!Array.isArray(value)) {
    return invalidTypeMessage(path, "array");
  }
  if (!schema.items) {
    return null;
  }
  for (let index = 0; index < value.length; index++) {
    const error = validateValue(value[index], schema.items, [...path, index]);
    if (error) {
      return error;
    }
  }
  return null;
}

function invalidTypeMessage(path: PathSegment[], expectedType: JSONSchemaType): string {
  if (path.length === 0 && expectedType === "object") {
    return "Arguments must be an object";
  }
  return `Invalid type for ${formatPath(path)}: expected ${expectedType}`;
}

function formatPath(path: PathSegment[]): string {
  if (path.length === 0) {
    return "arguments";
  }
  let output = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      output += `[${segment}]`;
    } else {
      output = output ? `${output}.${segment}` : segment;
    }
  }
  return output;
}

function checkType(value: unknown, expectedType: JSONSchemaType): boolean {
  switch (expectedType) {
    case "string":
      return typeof value === "string";
    case "number":
      return typeof value === "number" && Number.isFinite(value);
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "boolean":
      return typeof value === "boolean";
    case "array":
      return Array.isArray(value);
    case "object":
      return isRecord(value);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
