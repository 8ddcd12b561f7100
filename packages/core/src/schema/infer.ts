import type {
  AnyType,
  ArrayType,
  BoolType,
  CustomType,
  DateTimeType,
  DateType,
  FloatType,
  IntType,
  LiteralType,
  ModelType,
  OptionalType,
  RecordType,
  StringType,
  UnionType,
} from "./descriptors";
import type { SchemaDefinition } from "./define";
import type { FieldSpec } from "./field";

/** Static type produced by validating a value against a descriptor. */
export type InferType<D> = D extends StringType
  ? string
  : D extends IntType | FloatType
    ? number
    : D extends BoolType
      ? boolean
      : D extends DateType | DateTimeType
        ? Date
        : D extends LiteralType<infer V>
          ? V
          : D extends ModelType<infer S>
            ? InferSchema<S>
            : D extends ArrayType<infer I>
              ? InferType<I>[]
              : D extends RecordType<infer K, infer V>
                ? K extends LiteralType<infer L extends string>
                  ? Partial<Record<L, InferType<V>>>
                  : Record<string, InferType<V>>
                : D extends UnionType<infer O>
                  ? InferType<O[number]>
                  : D extends OptionalType<infer I>
                    ? InferType<I> | null
                    : D extends CustomType<infer T>
                      ? T
                      : D extends AnyType
                        ? unknown
                        : never;

export type InferFields<F> = Readonly<{
  [K in keyof F]: F[K] extends FieldSpec<infer D> ? InferType<D> : never;
}>;

export type InferSchema<S> = S extends SchemaDefinition<infer Shape> ? InferFields<Shape> : never;
