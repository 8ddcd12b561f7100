import type { CompiledConstraint } from "../constraints/checker";
import type { TypeDescriptor } from "../schema/descriptors";
import type { ExtraPolicy, SchemaDefinition } from "../schema/define";
import type { SiblingValues, PreFieldValidator, PostFieldValidator, PreModelValidator, PostModelValidator } from "../schema/validators";

export type DefaultPolicy =
  | { kind: "none" }
  | { kind: "static"; value: unknown }
  | { kind: "factory"; factory: () => unknown }
  | { kind: "dependent"; reads: readonly string[]; compute: (siblings: SiblingValues) => unknown };

export type CompiledField = {
  name: string;
  /** Input keys in lookup order: alias first, then the name when it is accepted. */
  keys: readonly string[];
  type: TypeDescriptor;
  optional: boolean;
  strict: boolean;
  constraints: readonly CompiledConstraint[];
  defaultPolicy: DefaultPolicy;
  preValidators: readonly PreFieldValidator[];
  postValidators: readonly PostFieldValidator[];
  /** Every sibling read by this field's validators or dependent default. */
  reads: readonly string[];
};

/**
 * Immutable, shareable result of compiling a schema. Execution order
 * satisfies every declared sibling read; declaration order drives error
 * reporting and record layout.
 */
export type ValidationPlan = {
  readonly name: string;
  readonly schema: SchemaDefinition;
  readonly fields: ReadonlyMap<string, CompiledField>;
  readonly declarationOrder: readonly string[];
  readonly executionOrder: readonly string[];
  readonly knownKeys: ReadonlySet<string>;
  /** Unset when the schema defers to the engine default. */
  readonly extra: ExtraPolicy | undefined;
  readonly preModelValidators: readonly PreModelValidator[];
  readonly postModelValidators: readonly PostModelValidator[];
};
