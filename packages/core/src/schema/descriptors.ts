import type { Outcome } from "./outcome";
import type { SchemaDefinition } from "./define";

export type LiteralValue = string | number | boolean;

export interface StringType {
  readonly kind: "string";
  readonly trim?: boolean;
  readonly lowercase?: boolean;
  readonly uppercase?: boolean;
}

export interface IntType {
  readonly kind: "int";
}

export interface FloatType {
  readonly kind: "float";
}

export interface BoolType {
  readonly kind: "bool";
}

/** Calendar date, materialized as a `Date` at UTC midnight. */
export interface DateType {
  readonly kind: "date";
}

export interface DateTimeType {
  readonly kind: "datetime";
}

export interface LiteralType<V extends LiteralValue = LiteralValue> {
  readonly kind: "literal";
  readonly values: readonly V[];
}

export interface ModelType<S extends SchemaDefinition = SchemaDefinition> {
  readonly kind: "model";
  /** A thunk defers resolution, which recursive schemas need. */
  readonly schema: S | (() => S);
}

export interface ArrayType<I extends TypeDescriptor = TypeDescriptor> {
  readonly kind: "array";
  readonly items: I;
}

export type RecordKeyType = StringType | LiteralType<string>;

export interface RecordType<
  K extends RecordKeyType = RecordKeyType,
  V extends TypeDescriptor = TypeDescriptor,
> {
  readonly kind: "record";
  readonly keys: K;
  readonly values: V;
}

export interface UnionType<O extends readonly TypeDescriptor[] = readonly TypeDescriptor[]> {
  readonly kind: "union";
  readonly options: O;
}

export interface OptionalType<I extends TypeDescriptor = TypeDescriptor> {
  readonly kind: "optional";
  readonly inner: I;
}

export interface AnyType {
  readonly kind: "any";
}

export type CustomCoerceContext = {
  strict: boolean;
};

export interface CustomType<T = unknown> {
  readonly kind: "custom";
  readonly name: string;
  coerce(value: unknown, ctx: CustomCoerceContext): Outcome<T>;
}

export type TypeDescriptor =
  | StringType
  | IntType
  | FloatType
  | BoolType
  | DateType
  | DateTimeType
  | LiteralType
  | ModelType
  | ArrayType
  | RecordType
  | UnionType
  | OptionalType
  | AnyType
  | CustomType;

export type TypeKind = TypeDescriptor["kind"];

export type StringOptions = Omit<StringType, "kind">;

/** Builders for type descriptors. */
export const t = {
  string(options: StringOptions = {}): StringType {
    return { kind: "string", ...options };
  },
  int(): IntType {
    return { kind: "int" };
  },
  float(): FloatType {
    return { kind: "float" };
  },
  bool(): BoolType {
    return { kind: "bool" };
  },
  date(): DateType {
    return { kind: "date" };
  },
  datetime(): DateTimeType {
    return { kind: "datetime" };
  },
  literal<const V extends readonly LiteralValue[]>(...values: V): LiteralType<V[number]> {
    return { kind: "literal", values };
  },
  /** Literal set built from the members of a TypeScript enum (reverse mappings skipped). */
  enumOf<V extends string | number>(enumObject: Readonly<Record<string, V>>): LiteralType<V> {
    const values: V[] = [];
    for (const [key, value] of Object.entries(enumObject)) {
      if (!Number.isNaN(Number(key))) continue;
      values.push(value);
    }
    return { kind: "literal", values };
  },
  model<S extends SchemaDefinition>(schema: S | (() => S)): ModelType<S> {
    return { kind: "model", schema };
  },
  array<I extends TypeDescriptor>(items: I): ArrayType<I> {
    return { kind: "array", items };
  },
  record<K extends RecordKeyType, V extends TypeDescriptor>(keys: K, values: V): RecordType<K, V> {
    return { kind: "record", keys, values };
  },
  union<const O extends readonly TypeDescriptor[]>(...options: O): UnionType<O> {
    return { kind: "union", options };
  },
  optional<I extends TypeDescriptor>(inner: I): OptionalType<I> {
    return { kind: "optional", inner };
  },
  any(): AnyType {
    return { kind: "any" };
  },
  custom<T>(name: string, coerce: (value: unknown, ctx: CustomCoerceContext) => Outcome<T>): CustomType<T> {
    return { kind: "custom", name, coerce };
  },
};

export function resolveModelSchema(type: ModelType): SchemaDefinition {
  return typeof type.schema === "function" ? type.schema() : type.schema;
}

/** Short human name of a type, used in union and literal messages. */
export function describeType(type: TypeDescriptor): string {
  switch (type.kind) {
    case "literal":
      return `literal[${type.values.map(formatLiteral).join(", ")}]`;
    case "model":
      return typeof type.schema === "function" ? "model" : type.schema.name;
    case "array":
      return `list[${describeType(type.items)}]`;
    case "record":
      return `mapping[${describeType(type.keys)}, ${describeType(type.values)}]`;
    case "union":
      return type.options.map(describeType).join(" | ");
    case "optional":
      return `optional[${describeType(type.inner)}]`;
    case "custom":
      return type.name;
    default:
      return type.kind;
  }
}

export function formatLiteral(value: LiteralValue): string {
  return typeof value === "string" ? `'${value}'` : String(value);
}
