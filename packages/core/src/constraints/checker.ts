import type { Constraints } from "../schema/field";
import type { TypeDescriptor } from "../schema/descriptors";
import type { Issue } from "../errors/error-tree";

/** Relative tolerance for `multipleOf` when either operand is not an integer. */
export const MULTIPLE_OF_EPSILON = 1e-9;

export type CompiledConstraint =
  | { name: "gt" | "ge" | "lt" | "le"; bound: number }
  | { name: "multipleOf"; factor: number }
  | { name: "minLength" | "maxLength"; limit: number }
  | { name: "pattern"; regex: RegExp; source: string };

type ValueShape = "number" | "sized" | "string";

const SHAPE_OF: Record<keyof Constraints, ValueShape> = {
  gt: "number",
  ge: "number",
  lt: "number",
  le: "number",
  multipleOf: "number",
  minLength: "sized",
  maxLength: "sized",
  pattern: "string",
};

function isConstraintName(name: string): name is keyof Constraints {
  return Object.prototype.hasOwnProperty.call(SHAPE_OF, name);
}

/** Whether a value of the given type can ever have the shape a constraint needs. */
function canProduce(type: TypeDescriptor, shape: ValueShape): boolean {
  switch (type.kind) {
    case "int":
    case "float":
      return shape === "number";
    case "string":
      return shape === "string" || shape === "sized";
    case "array":
    case "record":
      return shape === "sized";
    case "literal":
      return type.values.some((v) =>
        shape === "number" ? typeof v === "number" : typeof v === "string",
      );
    case "union":
      return type.options.some((option) => canProduce(option, shape));
    case "optional":
      return canProduce(type.inner, shape);
    case "any":
    case "custom":
      return true;
    default:
      return false;
  }
}

function anchor(pattern: string | RegExp): RegExp {
  if (typeof pattern === "string") return new RegExp(`^(?:${pattern})$`);
  return new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace(/[gy]/g, ""));
}

/**
 * Prepares a field's constraint set, preserving declaration order.
 * Problems are returned for the compiler to report together.
 */
export function compileConstraints(
  constraints: Constraints,
  type: TypeDescriptor,
): { constraints: CompiledConstraint[]; problems: string[] } {
  const compiled: CompiledConstraint[] = [];
  const problems: string[] = [];

  for (const [name, value] of Object.entries(constraints)) {
    const raw: unknown = value;
    if (raw === undefined) continue;
    if (!isConstraintName(name)) {
      problems.push(`unknown constraint "${name}"`);
      continue;
    }
    if (!canProduce(type, SHAPE_OF[name])) {
      problems.push(`constraint "${name}" does not apply to type ${type.kind}`);
      continue;
    }

    switch (name) {
      case "gt":
      case "ge":
      case "lt":
      case "le":
        if (typeof raw !== "number" || Number.isNaN(raw)) {
          problems.push(`constraint "${name}" must be a number`);
        } else {
          compiled.push({ name, bound: raw });
        }
        break;
      case "multipleOf":
        if (typeof raw !== "number" || !(raw > 0) || !Number.isFinite(raw)) {
          problems.push(`constraint "multipleOf" must be a positive number`);
        } else {
          compiled.push({ name, factor: raw });
        }
        break;
      case "minLength":
      case "maxLength":
        if (typeof raw !== "number" || !Number.isInteger(raw) || raw < 0) {
          problems.push(`constraint "${name}" must be a non-negative integer`);
        } else {
          compiled.push({ name, limit: raw });
        }
        break;
      case "pattern":
        if (typeof raw !== "string" && !(raw instanceof RegExp)) {
          problems.push(`constraint "pattern" must be a string or RegExp`);
          break;
        }
        try {
          compiled.push({
            name,
            regex: anchor(raw),
            source: typeof raw === "string" ? raw : raw.source,
          });
        } catch (error) {
          problems.push(
            `constraint "pattern" is not a valid regular expression: ${error instanceof Error ? error.message : String(error)}`,
          );
        }
        break;
    }
  }

  return { constraints: compiled, problems };
}

export function isMultipleOf(value: number, factor: number): boolean {
  if (Number.isInteger(value) && Number.isInteger(factor)) {
    return value % factor === 0;
  }
  const quotient = value / factor;
  return Math.abs(quotient - Math.round(quotient)) <= MULTIPLE_OF_EPSILON * Math.max(1, Math.abs(quotient));
}

function sizeOf(value: unknown): { size: number; noun: "String" | "List" | "Mapping"; unit: string } | null {
  if (typeof value === "string") return { size: [...value].length, noun: "String", unit: "character" };
  if (Array.isArray(value)) return { size: value.length, noun: "List", unit: "item" };
  if (typeof value === "object" && value !== null && !(value instanceof Date)) {
    return { size: Object.keys(value).length, noun: "Mapping", unit: "item" };
  }
  return null;
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? "" : "s"}`;
}

function violation(code: string, message: string, input: unknown): Issue {
  return { kind: "constraint_violation", code, message, input };
}

/**
 * Evaluates every constraint independently and returns all violations in
 * declaration order. Constraints whose shape does not match the value
 * (e.g. `gt` against a string member of a union) are not applicable.
 */
export function checkConstraints(value: unknown, constraints: readonly CompiledConstraint[]): Issue[] {
  const issues: Issue[] = [];

  for (const constraint of constraints) {
    switch (constraint.name) {
      case "gt":
        if (typeof value === "number" && !(value > constraint.bound)) {
          issues.push(violation("greater_than", `Input should be greater than ${constraint.bound}`, value));
        }
        break;
      case "ge":
        if (typeof value === "number" && !(value >= constraint.bound)) {
          issues.push(
            violation("greater_than_equal", `Input should be greater than or equal to ${constraint.bound}`, value),
          );
        }
        break;
      case "lt":
        if (typeof value === "number" && !(value < constraint.bound)) {
          issues.push(violation("less_than", `Input should be less than ${constraint.bound}`, value));
        }
        break;
      case "le":
        if (typeof value === "number" && !(value <= constraint.bound)) {
          issues.push(
            violation("less_than_equal", `Input should be less than or equal to ${constraint.bound}`, value),
          );
        }
        break;
      case "multipleOf":
        if (typeof value === "number" && !isMultipleOf(value, constraint.factor)) {
          issues.push(violation("multiple_of", `Input should be a multiple of ${constraint.factor}`, value));
        }
        break;
      case "minLength": {
        const sized = sizeOf(value);
        if (sized && sized.size < constraint.limit) {
          issues.push(
            violation(
              sized.noun === "String" ? "string_too_short" : "too_short",
              `${sized.noun} should have at least ${plural(constraint.limit, sized.unit)}`,
              value,
            ),
          );
        }
        break;
      }
      case "maxLength": {
        const sized = sizeOf(value);
        if (sized && sized.size > constraint.limit) {
          issues.push(
            violation(
              sized.noun === "String" ? "string_too_long" : "too_long",
              `${sized.noun} should have at most ${plural(constraint.limit, sized.unit)}`,
              value,
            ),
          );
        }
        break;
      }
      case "pattern":
        if (typeof value === "string" && !constraint.regex.test(value)) {
          issues.push(
            violation("string_pattern_mismatch", `String should match pattern '${constraint.source}'`, value),
          );
        }
        break;
    }
  }

  return issues;
}
