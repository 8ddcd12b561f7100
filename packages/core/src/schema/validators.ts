import type { Outcome } from "./outcome";

/** Declared sibling values a validator asked for. Only fields that validated are present. */
export type SiblingValues = Readonly<Record<string, unknown>>;

export type FieldValidatorContext = {
  field: string;
  siblings: SiblingValues;
};

/** Runs on the raw input before coercion; may transform or reject it. */
export interface PreFieldValidator {
  readonly mode: "pre";
  readonly reads: readonly string[];
  validate(value: unknown, ctx: FieldValidatorContext): Outcome<unknown>;
}

/** Runs on the coerced, constraint-checked value. */
export interface PostFieldValidator<T = unknown> {
  readonly mode: "post";
  readonly reads: readonly string[];
  validate(value: T, ctx: FieldValidatorContext): Outcome<T>;
}

export type FieldValidator<T = unknown> = PreFieldValidator | PostFieldValidator<T>;

/** A field validator declared on the schema rather than inline on the field. */
export type SchemaFieldValidator = {
  readonly field: string;
  readonly validator: FieldValidator;
};

export type ModelData = Readonly<Record<string, unknown>>;

export interface PreModelValidator {
  readonly mode: "pre";
  validate(input: ModelData): Outcome<Record<string, unknown>>;
}

export interface PostModelValidator {
  readonly mode: "post";
  validate(record: ModelData): Outcome<Record<string, unknown>>;
}

export type ModelValidator = PreModelValidator | PostModelValidator;

export type ValidatorOptions = {
  /** Sibling fields this validator reads. They are validated first. */
  reads?: readonly string[];
};

export function preValidator(
  fn: (value: unknown, ctx: FieldValidatorContext) => Outcome<unknown>,
  options: ValidatorOptions = {},
): PreFieldValidator {
  return { mode: "pre", reads: options.reads ?? [], validate: fn };
}

export function postValidator<T>(
  fn: (value: T, ctx: FieldValidatorContext) => Outcome<T>,
  options: ValidatorOptions = {},
): PostFieldValidator<T> {
  return { mode: "post", reads: options.reads ?? [], validate: fn };
}

export function fieldValidator(field: string, validator: FieldValidator): SchemaFieldValidator {
  return { field, validator };
}

/** Reshapes the raw input mapping before any field runs. */
export function preModelValidator(
  fn: (input: ModelData) => Outcome<Record<string, unknown>>,
): PreModelValidator {
  return { mode: "pre", validate: fn };
}

/** Checks or transforms the fully validated draft record. */
export function postModelValidator(
  fn: (record: ModelData) => Outcome<Record<string, unknown>>,
): PostModelValidator {
  return { mode: "post", validate: fn };
}
