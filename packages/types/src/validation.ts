export interface Schema<T = unknown> {
  parse(data: unknown): T;
}

/** One step of an error location: a field/key name or a sequence index. */
export type PathSegment = string | number;

export type ErrorKind =
  | "missing_required"
  | "type_error"
  | "constraint_violation"
  | "custom"
  | "model_rejection"
  | "extra_forbidden";

export type FieldError = {
  /** Location as segments, e.g. `["items", 1, "price"]`. Empty for the record itself. */
  loc: readonly PathSegment[];
  /** Dotted/indexed rendering of `loc`, e.g. `items[1].price`. */
  path: string;
  kind: ErrorKind;
  /** Machine-readable reason within the kind, e.g. `int_parsing` or `greater_than_equal`. */
  code: string;
  message: string;
  input: unknown;
};

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: FieldError[] };
