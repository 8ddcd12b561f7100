import { describe, it, expect } from "vitest";
import { compile } from "../../src/compiler/compiler";
import type { CompiledField } from "../../src/compiler/plan";
import { runFieldPipeline, type FieldOutcome, type PipelineContext } from "../../src/pipeline/field-pipeline";
import { defineSchema, type SchemaConfig } from "../../src/schema/define";
import { t } from "../../src/schema/descriptors";
import { derive, field, type FieldMap } from "../../src/schema/field";
import { ok, reject } from "../../src/schema/outcome";
import { postValidator, preValidator } from "../../src/schema/validators";

const ctx: PipelineContext = {
  depth: 0,
  maxDepth: 32,
  validateModel: () => ({ ok: true, value: {} }),
};

let schemaCount = 0;

function compiledField(fields: FieldMap, name: string, config: SchemaConfig = {}): CompiledField {
  schemaCount += 1;
  const plan = compile(defineSchema({ name: `Shape${schemaCount}`, fields, config }));
  const compiled = plan.fields.get(name);
  if (!compiled) throw new Error(`no field ${name}`);
  return compiled;
}

function run(
  target: CompiledField,
  input: Record<string, unknown>,
  done: ReadonlyMap<string, unknown> = new Map(),
): FieldOutcome {
  return runFieldPipeline(target, input, done, ctx);
}

// ---------------------------------------------------------------------------
// Absent values
// ---------------------------------------------------------------------------

describe("runFieldPipeline: absent input", () => {
  it("fails a required field as missing", () => {
    const target = compiledField({ age: field(t.int()) }, "age");

    expect(run(target, {})).toEqual({
      state: "failed",
      reachedState: "pending",
      errors: [
        {
          type: "issue",
          issue: { kind: "missing_required", code: "missing", message: "Field required", input: undefined },
        },
      ],
    });
  });

  it("treats undefined as absent and null as present", () => {
    const target = compiledField({ age: field(t.int()) }, "age");

    const fromUndefined = run(target, { age: undefined });
    expect(fromUndefined.state === "failed" && fromUndefined.reachedState).toBe("pending");

    const fromNull = run(target, { age: null });
    expect(fromNull.state === "failed" && fromNull.reachedState).toBe("coerced");
  });

  it("materialises an absent optional field as null", () => {
    const target = compiledField({ note: field(t.optional(t.string())) }, "note");
    expect(run(target, {})).toEqual({ state: "done", value: null });
  });

  it("copies static defaults for every run", () => {
    const target = compiledField({ tags: field(t.array(t.string()), { default: ["a"] }) }, "tags");

    const first = run(target, {});
    const second = run(target, {});
    expect(first).toEqual({ state: "done", value: ["a"] });
    expect(first.state === "done" && second.state === "done" && first.value !== second.value).toBe(true);
  });

  it("reports a throwing default factory as a custom error", () => {
    const target = compiledField(
      {
        token: field(t.string(), {
          defaultFactory: () => {
            throw new Error("entropy unavailable");
          },
        }),
      },
      "token",
    );

    expect(run(target, {})).toEqual({
      state: "failed",
      reachedState: "pending",
      errors: [
        {
          type: "issue",
          issue: { kind: "custom", code: "default_factory", message: "entropy unavailable", input: undefined },
        },
      ],
    });
  });

  it("keeps class instances produced by a default factory", () => {
    class Money {
      constructor(readonly cents: number) {}
    }
    const target = compiledField({ price: field(t.any(), { defaultFactory: () => new Money(0) }) }, "price");

    const outcome = run(target, {});
    expect(outcome.state === "done" && outcome.value instanceof Money).toBe(true);
    expect(outcome).toEqual({ state: "done", value: new Money(0) });
  });

  it("computes dependent defaults from validated siblings", () => {
    const fields = {
      first: field(t.string()),
      display: field(t.string(), { defaultFrom: derive(["first"], (s) => `Hi ${String(s.first)}`) }),
    };
    const target = compiledField(fields, "display");

    expect(run(target, {}, new Map([["first", "Ada"]]))).toEqual({ state: "done", value: "Hi Ada" });
    expect(run(target, {}, new Map())).toEqual({ state: "skipped" });
  });
});

// ---------------------------------------------------------------------------
// Present values
// ---------------------------------------------------------------------------

describe("runFieldPipeline: present input", () => {
  it("prefers the alias over the internal name", () => {
    const target = compiledField(
      { user_name: field(t.string(), { alias: "userName" }) },
      "user_name",
      { populateByName: true },
    );

    expect(run(target, { user_name: "internal", userName: "alias" })).toEqual({ state: "done", value: "alias" });
    expect(run(target, { user_name: "internal" })).toEqual({ state: "done", value: "internal" });
  });

  it("lets pre validators reshape raw input before coercion", () => {
    const split = preValidator((value) => ok(typeof value === "string" ? value.split(",") : value));
    const target = compiledField({ ids: field(t.array(t.int()), { validators: [split] }) }, "ids");

    expect(run(target, { ids: "1,2,3" })).toEqual({ state: "done", value: [1, 2, 3] });
  });

  it("stops at the first rejecting pre validator", () => {
    const refuse = preValidator(() => reject("Blank input is not allowed", "blank"));
    const target = compiledField({ name: field(t.string(), { validators: [refuse] }) }, "name");

    expect(run(target, { name: "" })).toEqual({
      state: "failed",
      reachedState: "pre_hooks_run",
      errors: [{ type: "issue", issue: { kind: "custom", code: "blank", message: "Blank input is not allowed", input: "" } }],
    });
  });

  it("reports every constraint violation together", () => {
    const target = compiledField(
      { code: field(t.string(), { constraints: { minLength: 4, pattern: "[A-Z]+" } }) },
      "code",
    );

    const outcome = run(target, { code: "ab" });
    expect(outcome.state === "failed" && outcome.reachedState).toBe("constraints_checked");
    expect(outcome.state === "failed" && outcome.errors.length).toBe(2);
  });

  it("skips constraints for null optional values", () => {
    const target = compiledField({ score: field(t.optional(t.int()), { constraints: { ge: 0 } }) }, "score");
    expect(run(target, { score: null })).toEqual({ state: "done", value: null });
  });

  it("runs post validators with declared siblings", () => {
    const after = postValidator(
      (end: Date, { siblings }) =>
        siblings.start instanceof Date && end.getTime() < siblings.start.getTime()
          ? reject("end must not precede start")
          : ok(end),
      { reads: ["start"] },
    );
    const fields = { start: field(t.date()), end: field(t.date(), { validators: [after] }) };
    const target = compiledField(fields, "end");
    const done = new Map<string, unknown>([["start", new Date(Date.UTC(2024, 5, 10))]]);

    expect(run(target, { end: "2024-06-01" }, done)).toEqual({
      state: "failed",
      reachedState: "custom_validated",
      errors: [
        {
          type: "issue",
          issue: {
            kind: "custom",
            code: "value_error",
            message: "end must not precede start",
            input: new Date(Date.UTC(2024, 5, 1)),
          },
        },
      ],
    });
    expect(run(target, { end: "2024-06-20" }, done)).toEqual({
      state: "done",
      value: new Date(Date.UTC(2024, 5, 20)),
    });
  });

  it("skips validators whose sibling did not validate", () => {
    const after = postValidator((end: Date) => ok(end), { reads: ["start"] });
    const fields = { start: field(t.date()), end: field(t.date(), { validators: [after] }) };
    const target = compiledField(fields, "end");

    expect(run(target, { end: "2024-06-01" })).toEqual({ state: "skipped" });
  });

  it("turns a throwing post validator into a custom error", () => {
    const explode = postValidator<number>(() => {
      throw new Error("checksum failed");
    });
    const target = compiledField({ n: field(t.int(), { validators: [explode] }) }, "n");

    const outcome = run(target, { n: "5" });
    expect(outcome).toEqual({
      state: "failed",
      reachedState: "custom_validated",
      errors: [{ type: "issue", issue: { kind: "custom", code: "value_error", message: "checksum failed", input: 5 } }],
    });
  });
});
