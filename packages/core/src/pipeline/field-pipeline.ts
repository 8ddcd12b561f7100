import type { CompiledField } from "../compiler/plan";
import { coerce, type CoerceContext } from "../coercion/coercer";
import { checkConstraints } from "../constraints/checker";
import { issueNode, type ErrorNode } from "../errors/error-tree";
import { hasOwn } from "../engine/mapping";
import { attempt, ok, type Outcome } from "../schema/outcome";
import type { SiblingValues } from "../schema/validators";

export type FieldState =
  | "pending"
  | "pre_hooks_run"
  | "coerced"
  | "constraints_checked"
  | "custom_validated"
  | "done"
  | "failed";

/**
 * Terminal state of one field. `skipped` means a declared sibling never
 * reached `done`; that sibling's own errors already fail the record.
 */
export type FieldOutcome =
  | { state: "done"; value: unknown }
  | { state: "failed"; reachedState: FieldState; errors: ErrorNode[] }
  | { state: "skipped" };

export type PipelineContext = Omit<CoerceContext, "strict">;

function failed(reachedState: FieldState, errors: ErrorNode[]): FieldOutcome {
  return { state: "failed", reachedState, errors };
}

/** Declared siblings, or null when one of them has no validated value. */
function pickSiblings(reads: readonly string[], done: ReadonlyMap<string, unknown>): SiblingValues | null {
  const siblings: Record<string, unknown> = {};
  for (const name of reads) {
    if (!done.has(name)) return null;
    siblings[name] = done.get(name);
  }
  return Object.freeze(siblings);
}

function lookup(field: CompiledField, input: Readonly<Record<string, unknown>>): { found: boolean; raw: unknown } {
  for (const key of field.keys) {
    if (hasOwn(input, key) && input[key] !== undefined) {
      return { found: true, raw: input[key] };
    }
  }
  return { found: false, raw: undefined };
}

function resolveAbsent(field: CompiledField, done: ReadonlyMap<string, unknown>): FieldOutcome {
  const policy = field.defaultPolicy;
  switch (policy.kind) {
    case "static":
      // Never share one default instance between records.
      return { state: "done", value: structuredClone(policy.value) };
    case "factory": {
      const produced = attempt(() => ok(policy.factory()));
      return produced.ok
        ? { state: "done", value: produced.value }
        : failed("pending", [issueNode("custom", "default_factory", produced.message, undefined)]);
    }
    case "dependent": {
      const siblings = pickSiblings(policy.reads, done);
      if (!siblings) return { state: "skipped" };
      const produced = attempt(() => ok(policy.compute(siblings)));
      return produced.ok
        ? { state: "done", value: produced.value }
        : failed("pending", [issueNode("custom", "default_factory", produced.message, undefined)]);
    }
    case "none":
      if (field.optional) return { state: "done", value: null };
      return failed("pending", [issueNode("missing_required", "missing", "Field required", undefined)]);
  }
}

/**
 * Runs one field through `pending → pre hooks → coercion → constraints →
 * post hooks`. Data problems come back as a failed outcome, never thrown.
 */
export function runFieldPipeline(
  field: CompiledField,
  input: Readonly<Record<string, unknown>>,
  done: ReadonlyMap<string, unknown>,
  ctx: PipelineContext,
): FieldOutcome {
  const { found, raw } = lookup(field, input);
  if (!found) return resolveAbsent(field, done);

  let value: unknown = raw;
  for (const validator of field.preValidators) {
    const siblings = pickSiblings(validator.reads, done);
    if (!siblings) return { state: "skipped" };
    const current = value;
    const outcome: Outcome<unknown> = attempt(() => validator.validate(current, { field: field.name, siblings }));
    if (!outcome.ok) {
      return failed("pre_hooks_run", [issueNode("custom", outcome.code, outcome.message, current)]);
    }
    value = outcome.value;
  }

  const coerced = coerce(value, field.type, { ...ctx, strict: field.strict });
  if (!coerced.ok) return failed("coerced", coerced.errors);
  value = coerced.value;

  if (value !== null) {
    const violations = checkConstraints(value, field.constraints);
    if (violations.length > 0) {
      return failed(
        "constraints_checked",
        violations.map((issue): ErrorNode => ({ type: "issue", issue })),
      );
    }
  }

  for (const validator of field.postValidators) {
    const siblings = pickSiblings(validator.reads, done);
    if (!siblings) return { state: "skipped" };
    const current = value;
    const outcome = attempt(() => validator.validate(current, { field: field.name, siblings }));
    if (!outcome.ok) {
      return failed("custom_validated", [issueNode("custom", outcome.code, outcome.message, current)]);
    }
    value = outcome.value;
  }

  return { state: "done", value };
}
