import type { FieldMap } from "./field";
import type { ModelValidator, SchemaFieldValidator } from "./validators";

export type ExtraPolicy = "ignore" | "forbid" | "allow";

export interface SchemaConfig {
  readonly extra?: ExtraPolicy;
  /** Also accept the internal name of an aliased field as an input key. */
  readonly populateByName?: boolean;
  /** Disable lax string conversions for every field. */
  readonly strict?: boolean;
}

export interface SchemaDefinition<Shape = FieldMap> {
  readonly name: string;
  /** Fields declared on this schema only; parents are merged at compile time. */
  readonly fields: FieldMap;
  readonly parents: readonly SchemaDefinition[];
  readonly config: SchemaConfig;
  readonly fieldValidators: readonly SchemaFieldValidator[];
  readonly modelValidators: readonly ModelValidator[];
  /** Type-level marker for the merged field map. Never set at runtime. */
  readonly __shape?: Shape;
}

type FieldsOf<S> = S extends SchemaDefinition<infer Shape> ? Shape : never;

type Merge<A, B> = Omit<A, keyof B> & B;

type MergeParents<P extends readonly SchemaDefinition[]> = P extends readonly [
  infer Head,
  ...infer Rest extends readonly SchemaDefinition[],
]
  ? Merge<FieldsOf<Head>, MergeParents<Rest>>
  : {};

export type SchemaInput<F extends FieldMap, P extends readonly SchemaDefinition[]> = {
  name: string;
  fields: F;
  extends?: readonly [...P];
  config?: SchemaConfig;
  fieldValidators?: readonly SchemaFieldValidator[];
  modelValidators?: readonly ModelValidator[];
};

export function defineSchema<F extends FieldMap, P extends readonly SchemaDefinition[] = []>(
  input: SchemaInput<F, P>,
): SchemaDefinition<Merge<MergeParents<P>, F>> {
  return Object.freeze({
    name: input.name,
    fields: Object.freeze({ ...input.fields }),
    parents: Object.freeze([...(input.extends ?? [])]),
    config: Object.freeze({ ...input.config }),
    fieldValidators: Object.freeze([...(input.fieldValidators ?? [])]),
    modelValidators: Object.freeze([...(input.modelValidators ?? [])]),
  });
}
