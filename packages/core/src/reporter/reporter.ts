import { formatPath, joinPath } from "@formwork/common";
import type { FieldError, PathSegment } from "@formwork/types";
import type { ErrorNode } from "../errors/error-tree";

/**
 * Flattens an error tree depth-first into addressable errors. Sibling
 * order is preserved, so callers control ordering by how they build the tree.
 */
export function reportErrors(tree: readonly ErrorNode[], prefix: readonly PathSegment[] = []): FieldError[] {
  const errors: FieldError[] = [];

  for (const node of tree) {
    if (node.type === "nested") {
      errors.push(...reportErrors(node.children, joinPath(prefix, node.segment)));
      continue;
    }
    const loc = Object.freeze([...prefix]);
    errors.push(
      Object.freeze({
        loc,
        path: formatPath(loc),
        kind: node.issue.kind,
        code: node.issue.code,
        message: node.issue.message,
        input: node.issue.input,
      }),
    );
  }

  return errors;
}

function formatInput(input: unknown): string {
  if (input instanceof Date) return Number.isNaN(input.getTime()) ? "Invalid Date" : input.toISOString();
  if (typeof input === "bigint" || typeof input === "symbol" || typeof input === "function") {
    return String(input);
  }
  try {
    const rendered = JSON.stringify(input);
    return rendered === undefined ? String(input) : rendered;
  } catch {
    return String(input);
  }
}

/**
 * Renders errors as a multi-line summary:
 *
 * ```
 * 2 validation errors for User
 * age
 *   Input should be greater than or equal to 0 [kind=constraint_violation, code=greater_than_equal, input=-1]
 * email
 *   Field required [kind=missing_required, code=missing]
 * ```
 */
export function formatErrors(title: string, errors: readonly FieldError[]): string {
  const lines = [`${errors.length} validation error${errors.length === 1 ? "" : "s"} for ${title}`];
  for (const error of errors) {
    const details = [`kind=${error.kind}`, `code=${error.code}`];
    if (error.input !== undefined) details.push(`input=${formatInput(error.input)}`);
    lines.push(error.path || "(root)");
    lines.push(`  ${error.message} [${details.join(", ")}]`);
  }
  return lines.join("\n");
}

/** Groups errors by path, keeping report order within each group. */
export function errorsByPath(errors: readonly FieldError[]): Map<string, FieldError[]> {
  const grouped = new Map<string, FieldError[]>();
  for (const error of errors) {
    const group = grouped.get(error.path);
    if (group) group.push(error);
    else grouped.set(error.path, [error]);
  }
  return grouped;
}
