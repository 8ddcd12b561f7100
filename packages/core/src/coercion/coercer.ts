import {
  describeType,
  formatLiteral,
  resolveModelSchema,
  type ArrayType,
  type LiteralType,
  type LiteralValue,
  type ModelType,
  type RecordType,
  type StringType,
  type TypeDescriptor,
  type UnionType,
} from "../schema/descriptors";
import type { SchemaDefinition } from "../schema/define";
import { attempt } from "../schema/outcome";
import { issueNode, nestedNode, type ErrorNode } from "../errors/error-tree";
import { isPlainMapping, toEntries } from "../engine/mapping";
import { isUtcMidnight, isValidDate, parseIsoDate, parseIsoDateTime } from "./temporal";

export type CoercionResult = { ok: true; value: unknown } | { ok: false; errors: ErrorNode[] };

export type CoerceContext = {
  /** Disables string → number/bool/date conversions. */
  strict: boolean;
  depth: number;
  maxDepth: number;
  /** Validates a nested model one level deeper. Supplied by the engine. */
  validateModel(schema: SchemaDefinition, value: unknown, depth: number): CoercionResult;
};

const INT_LITERAL = /^[+-]?\d+$/;
const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const TRUE_TOKENS = new Set(["true", "1", "yes", "on"]);
const FALSE_TOKENS = new Set(["false", "0", "no", "off"]);

function success(value: unknown): CoercionResult {
  return { ok: true, value };
}

function typeError(code: string, message: string, input: unknown): CoercionResult {
  return { ok: false, errors: [issueNode("type_error", code, message, input)] };
}

/**
 * Converts a present raw value toward a declared type. Absent values never
 * reach this function; the engine resolves defaults and missing fields first.
 */
export function coerce(value: unknown, type: TypeDescriptor, ctx: CoerceContext): CoercionResult {
  switch (type.kind) {
    case "string":
      return coerceString(value, type);
    case "int":
      return coerceInt(value, ctx);
    case "float":
      return coerceFloat(value, ctx);
    case "bool":
      return coerceBool(value, ctx);
    case "date":
      return coerceDate(value, ctx);
    case "datetime":
      return coerceDateTime(value, ctx);
    case "literal":
      return coerceLiteral(value, type, ctx);
    case "model":
      return coerceModel(value, type, ctx);
    case "array":
      return coerceArray(value, type, ctx);
    case "record":
      return coerceRecord(value, type, ctx);
    case "union":
      return coerceUnion(value, type, ctx);
    case "optional":
      return value === null || value === undefined ? success(null) : coerce(value, type.inner, ctx);
    case "any":
      return success(value);
    case "custom": {
      const outcome = attempt(() => type.coerce(value, { strict: ctx.strict }));
      return outcome.ok ? success(outcome.value) : typeError(outcome.code, outcome.message, value);
    }
  }
}

function coerceString(value: unknown, type: StringType): CoercionResult {
  if (typeof value !== "string") {
    return typeError("string_type", "Input should be a valid string", value);
  }
  let result = type.trim ? value.trim() : value;
  if (type.lowercase) result = result.toLowerCase();
  if (type.uppercase) result = result.toUpperCase();
  return success(result);
}

function coerceInt(value: unknown, ctx: CoerceContext): CoercionResult {
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return typeError("finite_number", "Input should be a finite number", value);
    }
    if (!Number.isInteger(value)) {
      return typeError(
        "int_from_float",
        "Input should be a valid integer, got a number with a fractional part",
        value,
      );
    }
    if (!Number.isSafeInteger(value)) {
      return typeError("int_unsafe", "Input should be a safe integer", value);
    }
    return success(value);
  }

  if (typeof value === "string" && !ctx.strict) {
    const text = value.trim();
    if (!INT_LITERAL.test(text)) {
      return typeError(
        "int_parsing",
        "Input should be a valid integer, unable to parse string as an integer",
        value,
      );
    }
    const parsed = Number(text);
    if (!Number.isSafeInteger(parsed)) {
      return typeError("int_unsafe", "Input should be a safe integer", value);
    }
    return success(parsed);
  }

  return typeError("int_type", "Input should be a valid integer", value);
}

function coerceFloat(value: unknown, ctx: CoerceContext): CoercionResult {
  if (typeof value === "number") {
    return Number.isFinite(value)
      ? success(value)
      : typeError("finite_number", "Input should be a finite number", value);
  }

  if (typeof value === "string" && !ctx.strict) {
    const text = value.trim();
    if (!FLOAT_LITERAL.test(text)) {
      return typeError(
        "float_parsing",
        "Input should be a valid number, unable to parse string as a number",
        value,
      );
    }
    const parsed = Number(text);
    return Number.isFinite(parsed)
      ? success(parsed)
      : typeError("finite_number", "Input should be a finite number", value);
  }

  return typeError("float_type", "Input should be a valid number", value);
}

function coerceBool(value: unknown, ctx: CoerceContext): CoercionResult {
  if (typeof value === "boolean") return success(value);
  if (ctx.strict) {
    return typeError("bool_type", "Input should be a valid boolean", value);
  }

  if (typeof value === "number") {
    if (value === 1) return success(true);
    if (value === 0) return success(false);
  } else if (typeof value === "string") {
    const token = value.toLowerCase();
    if (TRUE_TOKENS.has(token)) return success(true);
    if (FALSE_TOKENS.has(token)) return success(false);
  } else {
    return typeError("bool_type", "Input should be a valid boolean", value);
  }

  return typeError("bool_parsing", "Input should be a valid boolean, unable to interpret input", value);
}

function coerceDate(value: unknown, ctx: CoerceContext): CoercionResult {
  if (value instanceof Date) {
    if (!isValidDate(value)) {
      return typeError("date_type", "Input should be a valid date", value);
    }
    return isUtcMidnight(value)
      ? success(new Date(value.getTime()))
      : typeError(
          "date_from_datetime_inexact",
          "Datetimes provided to dates should have zero time",
          value,
        );
  }

  if (typeof value === "string" && !ctx.strict) {
    const parsed = parseIsoDate(value);
    return parsed
      ? success(parsed)
      : typeError("date_parsing", "Input should be a valid date in the format YYYY-MM-DD", value);
  }

  return typeError("date_type", "Input should be a valid date", value);
}

function coerceDateTime(value: unknown, ctx: CoerceContext): CoercionResult {
  if (value instanceof Date) {
    return isValidDate(value)
      ? success(new Date(value.getTime()))
      : typeError("datetime_type", "Input should be a valid datetime", value);
  }

  if (typeof value === "string" && !ctx.strict) {
    const parsed = parseIsoDateTime(value);
    return parsed
      ? success(parsed)
      : typeError("datetime_parsing", "Input should be a valid datetime, unable to parse string", value);
  }

  return typeError("datetime_type", "Input should be a valid datetime", value);
}

function literalPrimitive(literal: LiteralValue): TypeDescriptor {
  if (typeof literal === "number") return { kind: "float" };
  if (typeof literal === "boolean") return { kind: "bool" };
  return { kind: "string" };
}

function coerceLiteral(value: unknown, type: LiteralType, ctx: CoerceContext): CoercionResult {
  for (const literal of type.values) {
    if (value === literal) return success(literal);
  }

  if (!ctx.strict) {
    for (const literal of type.values) {
      const converted = coerce(value, literalPrimitive(literal), ctx);
      if (converted.ok && converted.value === literal) return success(literal);
    }
  }

  return typeError("literal_error", `Input should be ${describeLiteralSet(type.values)}`, value);
}

function describeLiteralSet(values: readonly LiteralValue[]): string {
  const rendered = values.map(formatLiteral);
  if (rendered.length <= 1) return rendered.join("");
  return `${rendered.slice(0, -1).join(", ")} or ${rendered[rendered.length - 1]}`;
}

function coerceModel(value: unknown, type: ModelType, ctx: CoerceContext): CoercionResult {
  if (ctx.depth >= ctx.maxDepth) {
    return typeError("recursion_depth", `Maximum nesting depth of ${ctx.maxDepth} exceeded`, value);
  }
  let schema: SchemaDefinition;
  try {
    schema = resolveModelSchema(type);
  } catch (error) {
    return typeError("model_resolution", error instanceof Error ? error.message : String(error), value);
  }
  return ctx.validateModel(schema, value, ctx.depth + 1);
}

function coerceArray(value: unknown, type: ArrayType, ctx: CoerceContext): CoercionResult {
  if (!Array.isArray(value)) {
    return typeError("list_type", "Input should be a valid list", value);
  }

  const items: unknown[] = [];
  const errors: ErrorNode[] = [];
  // Holes in sparse arrays read as undefined.
  for (let index = 0; index < value.length; index++) {
    const element: unknown = value[index];
    const result = coerce(element, type.items, ctx);
    if (result.ok) items.push(result.value);
    else errors.push(nestedNode(index, result.errors));
  }

  return errors.length > 0 ? { ok: false, errors } : success(items);
}

function coerceRecord(value: unknown, type: RecordType, ctx: CoerceContext): CoercionResult {
  if (!isPlainMapping(value)) {
    return typeError("dict_type", "Input should be a valid mapping", value);
  }

  const entries: [string, unknown][] = [];
  const errors: ErrorNode[] = [];
  for (const [key, element] of toEntries(value)) {
    const keyResult = coerce(key, type.keys, ctx);
    const valueResult = coerce(element, type.values, ctx);
    if (keyResult.ok && valueResult.ok) {
      entries.push([String(keyResult.value), valueResult.value]);
      continue;
    }
    errors.push(
      nestedNode(key, [
        ...(keyResult.ok ? [] : keyResult.errors),
        ...(valueResult.ok ? [] : valueResult.errors),
      ]),
    );
  }

  return errors.length > 0 ? { ok: false, errors } : success(Object.fromEntries(entries));
}

function coerceUnion(value: unknown, type: UnionType, ctx: CoerceContext): CoercionResult {
  for (const option of type.options) {
    const result = coerce(value, option, ctx);
    if (result.ok) return result;
  }
  return typeError(
    "union_no_match",
    `Input did not match any union member (${type.options.map(describeType).join(", ")})`,
    value,
  );
}
