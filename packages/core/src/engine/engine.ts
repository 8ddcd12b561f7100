import createDebug from "debug";
import type { ValidationResult } from "@formwork/types";
import { compile } from "../compiler/compiler";
import type { ValidationPlan } from "../compiler/plan";
import { issueNode, nestedNode, type ErrorNode } from "../errors/error-tree";
import { runFieldPipeline, type PipelineContext } from "../pipeline/field-pipeline";
import { reportErrors } from "../reporter/reporter";
import { attempt } from "../schema/outcome";
import { resolveEngineConfig, type EngineConfig, type EngineOptions } from "./config";
import { isPlainMapping, setOwn, toEntries } from "./mapping";

const debug = createDebug("formwork:core:engine");

export type ValidatedRecord = Readonly<Record<string, unknown>>;

export type RunResult = { ok: true; value: ValidatedRecord } | { ok: false; errors: ErrorNode[] };

function rejected(errors: ErrorNode[]): RunResult {
  return { ok: false, errors };
}

/**
 * Executes a plan against one input. Errors are collected across every
 * field; a record is only materialized when nothing failed.
 */
export function runPlan(
  plan: ValidationPlan,
  raw: unknown,
  config: EngineConfig,
  depth: number,
): RunResult {
  if (!isPlainMapping(raw)) {
    return rejected([issueNode("type_error", "model_type", "Input should be a valid mapping", raw)]);
  }

  let input: Record<string, unknown> = Object.fromEntries(toEntries(raw));

  for (const validator of plan.preModelValidators) {
    const snapshot = Object.freeze({ ...input });
    const outcome = attempt(() => validator.validate(snapshot));
    if (!outcome.ok) {
      return rejected([issueNode("model_rejection", outcome.code, outcome.message, snapshot)]);
    }
    input = outcome.value;
  }

  const ctx: PipelineContext = {
    depth,
    maxDepth: config.maxDepth,
    validateModel: (schema, value, nextDepth) => runPlan(compile(schema), value, config, nextDepth),
  };

  const done = new Map<string, unknown>();
  const fieldErrors = new Map<string, ErrorNode[]>();
  for (const name of plan.executionOrder) {
    const field = plan.fields.get(name);
    if (!field) continue;

    const outcome = runFieldPipeline(field, input, done, ctx);
    if (outcome.state === "done") {
      done.set(name, outcome.value);
    } else if (outcome.state === "failed") {
      debug("%s.%s failed at %s", plan.name, name, outcome.reachedState);
      fieldErrors.set(name, outcome.errors);
    }
  }

  const extraPolicy = plan.extra ?? config.defaultExtra;
  const extraErrors: ErrorNode[] = [];
  const extras: [string, unknown][] = [];
  for (const [key, value] of Object.entries(input)) {
    if (plan.knownKeys.has(key)) continue;
    if (extraPolicy === "forbid") {
      extraErrors.push(
        nestedNode(key, [
          issueNode("extra_forbidden", "extra_forbidden", "Extra inputs are not permitted", value),
        ]),
      );
    } else if (extraPolicy === "allow") {
      extras.push([key, value]);
    }
  }

  if (fieldErrors.size > 0 || extraErrors.length > 0) {
    const errors: ErrorNode[] = [];
    for (const name of plan.declarationOrder) {
      const nodes = fieldErrors.get(name);
      if (nodes) errors.push(nestedNode(name, nodes));
    }
    return rejected([...errors, ...extraErrors]);
  }

  let record: Record<string, unknown> = {};
  for (const name of plan.declarationOrder) {
    setOwn(record, name, done.get(name));
  }
  for (const [key, value] of extras) {
    setOwn(record, key, value);
  }

  for (const validator of plan.postModelValidators) {
    const draft = Object.freeze({ ...record });
    const outcome = attempt(() => validator.validate(draft));
    if (!outcome.ok) {
      return rejected([issueNode("model_rejection", outcome.code, outcome.message, draft)]);
    }
    record = outcome.value;
  }

  return { ok: true, value: Object.freeze(record) };
}

/**
 * Validates raw input against a compiled plan. Returns either the frozen
 * record or every error found, ordered for reporting.
 */
export function validate(
  plan: ValidationPlan,
  raw: unknown,
  options: EngineOptions = {},
): ValidationResult<ValidatedRecord> {
  const result = runPlan(plan, raw, resolveEngineConfig(options), 0);
  if (result.ok) {
    debug("validate %s: ok", plan.name);
    return { success: true, data: result.value };
  }

  const errors = reportErrors(result.errors);
  debug("validate %s: %d errors", plan.name, errors.length);
  return { success: false, errors };
}
