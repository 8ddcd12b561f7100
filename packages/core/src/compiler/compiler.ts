import createDebug from "debug";
import { compileConstraints } from "../constraints/checker";
import { CompileError } from "../errors/formwork-error";
import { resolveModelSchema, type TypeDescriptor } from "../schema/descriptors";
import type { SchemaConfig, SchemaDefinition } from "../schema/define";
import type { FieldSpec } from "../schema/field";
import type {
  ModelValidator,
  PostFieldValidator,
  PostModelValidator,
  PreFieldValidator,
  PreModelValidator,
  SchemaFieldValidator,
} from "../schema/validators";
import { sortByDependencies } from "./dependency-graph";
import type { CompiledField, DefaultPolicy, ValidationPlan } from "./plan";

const debug = createDebug("formwork:core:compiler");

const cache = new WeakMap<SchemaDefinition, ValidationPlan>();
const compiling = new Set<SchemaDefinition>();

export type MergedSchema = {
  fields: Map<string, FieldSpec>;
  fieldValidators: SchemaFieldValidator[];
  modelValidators: ModelValidator[];
  config: SchemaConfig;
};

function withoutValidatorsFor(validators: SchemaFieldValidator[], names: Set<string>): SchemaFieldValidator[] {
  return validators.filter((v) => !names.has(v.field));
}

/**
 * Flattens a schema and its parents into one field table. Parents merge in
 * `extends` order and the child last; a redeclared field replaces the
 * inherited spec in place and drops validators inherited for it.
 */
export function mergeSchema(schema: SchemaDefinition): MergedSchema {
  const fields = new Map<string, FieldSpec>();
  let fieldValidators: SchemaFieldValidator[] = [];
  const modelValidators: ModelValidator[] = [];
  let config: SchemaConfig = {};

  for (const parent of schema.parents) {
    const inherited = mergeSchema(parent);

    const overridden = new Set<string>();
    for (const [name, spec] of inherited.fields) {
      const existing = fields.get(name);
      if (existing && existing !== spec) overridden.add(name);
      fields.set(name, spec);
    }
    fieldValidators = withoutValidatorsFor(fieldValidators, overridden);

    for (const validator of inherited.fieldValidators) {
      if (!fieldValidators.includes(validator)) fieldValidators.push(validator);
    }
    for (const validator of inherited.modelValidators) {
      if (!modelValidators.includes(validator)) modelValidators.push(validator);
    }
    config = mergeConfig(config, inherited.config);
  }

  const own = new Set(Object.keys(schema.fields));
  fieldValidators = withoutValidatorsFor(fieldValidators, own);
  for (const [name, spec] of Object.entries(schema.fields)) {
    fields.set(name, spec);
  }
  fieldValidators.push(...schema.fieldValidators);
  modelValidators.push(...schema.modelValidators);
  config = mergeConfig(config, schema.config);

  return { fields, fieldValidators, modelValidators, config };
}

function mergeConfig(base: SchemaConfig, override: SchemaConfig): SchemaConfig {
  return {
    extra: override.extra ?? base.extra,
    populateByName: override.populateByName ?? base.populateByName,
    strict: override.strict ?? base.strict,
  };
}

/** Prototypes `structuredClone` reproduces. Anything else comes back as a plain object. */
const CLONED_PROTOTYPES = new Set<unknown>([
  null,
  Object.prototype,
  Array.prototype,
  Date.prototype,
  Map.prototype,
  Set.prototype,
  RegExp.prototype,
]);

function containsClassInstance(value: unknown, seen: Set<object>): boolean {
  if (typeof value !== "object" || value === null || seen.has(value)) return false;
  seen.add(value);

  const proto: unknown = Object.getPrototypeOf(value);
  if (!CLONED_PROTOTYPES.has(proto)) return true;

  let children: unknown[];
  if (value instanceof Map) children = [...value.keys(), ...value.values()];
  else if (value instanceof Set) children = [...value];
  else children = Object.values(value);
  return children.some((child) => containsClassInstance(child, seen));
}

function resolveDefault(spec: FieldSpec, problems: string[]): DefaultPolicy {
  const declared = [spec.default, spec.defaultFactory, spec.defaultFrom].filter((d) => d !== undefined);
  if (declared.length > 1) {
    problems.push("declares more than one of default, defaultFactory and defaultFrom");
  }

  if (spec.defaultFactory) return { kind: "factory", factory: spec.defaultFactory };
  if (spec.defaultFrom) {
    const dependent = spec.defaultFrom;
    return {
      kind: "dependent",
      reads: dependent.reads,
      compute: (siblings) => dependent.compute(siblings),
    };
  }
  if (spec.default !== undefined) {
    try {
      structuredClone(spec.default);
      if (containsClassInstance(spec.default, new Set())) {
        problems.push(
          "default value contains a class instance that copying would turn into a plain object; use defaultFactory instead",
        );
      }
    } catch {
      problems.push("default value cannot be copied per record; use defaultFactory instead");
    }
    return { kind: "static", value: spec.default };
  }
  return { kind: "none" };
}

function checkType(type: TypeDescriptor, problems: string[]): void {
  switch (type.kind) {
    case "literal":
      if (type.values.length === 0) problems.push("literal type declares no values");
      break;
    case "union":
      if (type.options.length === 0) problems.push("union type declares no alternatives");
      for (const option of type.options) checkType(option, problems);
      break;
    case "array":
      checkType(type.items, problems);
      break;
    case "record":
      if (type.keys.kind !== "string" && type.keys.kind !== "literal") {
        problems.push("record keys must be a string or literal type");
      } else if (type.keys.kind === "literal" && type.keys.values.some((v) => typeof v !== "string")) {
        problems.push("record key literals must be strings");
      }
      checkType(type.keys, problems);
      checkType(type.values, problems);
      break;
    case "optional":
      checkType(type.inner, problems);
      break;
    case "model": {
      // Nested schemas compile with the parent so their errors surface at
      // registration. A schema already compiling further up the stack is
      // a recursive reference and is left to that call.
      let nested: SchemaDefinition;
      try {
        nested = resolveModelSchema(type);
      } catch (error) {
        problems.push(`nested model could not be resolved: ${error instanceof Error ? error.message : String(error)}`);
        break;
      }
      if (!compiling.has(nested)) compile(nested);
      break;
    }
    default:
      break;
  }
}

function inputKeys(name: string, spec: FieldSpec, populateByName: boolean): string[] {
  if (spec.alias === undefined || spec.alias === name) return [name];
  return populateByName ? [spec.alias, name] : [spec.alias];
}

/**
 * Compiles a schema into a validation plan. Pure, and memoised per schema
 * object, so compiling twice yields the same plan.
 *
 * @throws CompileError when the declaration itself is invalid.
 */
export function compile(schema: SchemaDefinition): ValidationPlan {
  const cached = cache.get(schema);
  if (cached) {
    debug("compile %s → cached", schema.name);
    return cached;
  }

  compiling.add(schema);
  try {
    const plan = buildPlan(schema);
    cache.set(schema, plan);
    return plan;
  } finally {
    compiling.delete(schema);
  }
}

function buildPlan(schema: SchemaDefinition): ValidationPlan {
  const merged = mergeSchema(schema);
  const populateByName = merged.config.populateByName ?? false;
  const declarationOrder = [...merged.fields.keys()];
  const problems: string[] = [];
  const keyOwners = new Map<string, string>();
  const fields = new Map<string, CompiledField>();

  for (const [name, spec] of merged.fields) {
    const fieldProblems: string[] = [];

    const keys = inputKeys(name, spec, populateByName);
    for (const key of keys) {
      const owner = keyOwners.get(key);
      if (owner !== undefined) {
        fieldProblems.push(`input key "${key}" is already used by field "${owner}"`);
      } else {
        keyOwners.set(key, name);
      }
    }

    checkType(spec.type, fieldProblems);
    const defaultPolicy = resolveDefault(spec, fieldProblems);
    const constraints = compileConstraints(spec.constraints ?? {}, spec.type);
    fieldProblems.push(...constraints.problems);

    const validators = [
      ...(spec.validators ?? []),
      ...merged.fieldValidators.filter((v) => v.field === name).map((v) => v.validator),
    ];
    const preValidators: PreFieldValidator[] = [];
    const postValidators: PostFieldValidator[] = [];
    for (const validator of validators) {
      if (validator.mode === "pre") preValidators.push(validator);
      else postValidators.push(validator);
    }

    const reads = new Set<string>(validators.flatMap((v) => v.reads));
    if (defaultPolicy.kind === "dependent") {
      for (const read of defaultPolicy.reads) reads.add(read);
    }
    for (const read of reads) {
      if (!merged.fields.has(read)) fieldProblems.push(`reads unknown field "${read}"`);
    }

    problems.push(...fieldProblems.map((p) => `field "${name}": ${p}`));
    fields.set(name, {
      name,
      keys,
      type: spec.type,
      optional: spec.type.kind === "optional",
      strict: spec.strict ?? merged.config.strict ?? false,
      constraints: constraints.constraints,
      defaultPolicy,
      preValidators,
      postValidators,
      reads: [...reads],
    });
  }

  for (const { field } of merged.fieldValidators) {
    if (!merged.fields.has(field)) problems.push(`validator targets unknown field "${field}"`);
  }

  if (problems.length > 0) {
    throw new CompileError(schema.name, problems);
  }

  const sorted = sortByDependencies(declarationOrder, (name) => fields.get(name)?.reads ?? []);
  if (!sorted.ok) {
    throw new CompileError(schema.name, [`cyclic field dependency: ${sorted.cycle.join(" → ")}`]);
  }

  const preModelValidators: PreModelValidator[] = [];
  const postModelValidators: PostModelValidator[] = [];
  for (const validator of merged.modelValidators) {
    if (validator.mode === "pre") preModelValidators.push(validator);
    else postModelValidators.push(validator);
  }

  const plan: ValidationPlan = Object.freeze({
    name: schema.name,
    schema,
    fields,
    declarationOrder,
    executionOrder: sorted.order,
    knownKeys: new Set(keyOwners.keys()),
    extra: merged.config.extra,
    preModelValidators,
    postModelValidators,
  });

  debug(
    "compile %s: %d fields, order=[%s]",
    schema.name,
    declarationOrder.length,
    sorted.order.join(", "),
  );
  return plan;
}
