import type { TypeDescriptor } from "./descriptors";
import type { FieldValidator, SiblingValues } from "./validators";
import type { InferType } from "./infer";

export interface Constraints {
  readonly gt?: number;
  readonly ge?: number;
  readonly lt?: number;
  readonly le?: number;
  readonly multipleOf?: number;
  readonly minLength?: number;
  readonly maxLength?: number;
  /** Matched against the whole string. */
  readonly pattern?: string | RegExp;
}

export interface DependentDefault<T = unknown> {
  readonly reads: readonly string[];
  compute(siblings: SiblingValues): T;
}

export interface FieldSpec<D extends TypeDescriptor = TypeDescriptor> {
  readonly type: D;
  readonly constraints?: Constraints;
  /** External input key. */
  readonly alias?: string;
  /** Copied for every record that uses it. */
  readonly default?: unknown;
  readonly defaultFactory?: () => unknown;
  readonly defaultFrom?: DependentDefault;
  readonly validators?: readonly FieldValidator[];
  /** Overrides the schema's strict setting for this field. */
  readonly strict?: boolean;
  readonly description?: string;
}

export type FieldMap = Readonly<Record<string, FieldSpec>>;

export type FieldOptions<T> = {
  constraints?: Constraints;
  alias?: string;
  default?: T;
  defaultFactory?: () => T;
  defaultFrom?: DependentDefault<T>;
  validators?: readonly FieldValidator<T>[];
  strict?: boolean;
  description?: string;
};

export function field<D extends TypeDescriptor>(type: D, options: FieldOptions<InferType<D>> = {}): FieldSpec<D> {
  return Object.freeze({ type, ...options });
}

/** Default computed from already-validated sibling fields. */
export function derive<T>(
  reads: readonly string[],
  compute: (siblings: SiblingValues) => T,
): DependentDefault<T> {
  return { reads, compute };
}
