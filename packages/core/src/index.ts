// Declaration
export { t, describeType } from "./schema/descriptors";
export type {
  TypeDescriptor,
  TypeKind,
  LiteralValue,
  StringType,
  IntType,
  FloatType,
  BoolType,
  DateType,
  DateTimeType,
  LiteralType,
  ModelType,
  ArrayType,
  RecordType,
  RecordKeyType,
  UnionType,
  OptionalType,
  AnyType,
  CustomType,
  CustomCoerceContext,
} from "./schema/descriptors";
export { field, derive } from "./schema/field";
export type { Constraints, DependentDefault, FieldSpec, FieldMap, FieldOptions } from "./schema/field";
export { defineSchema } from "./schema/define";
export type { ExtraPolicy, SchemaConfig, SchemaDefinition, SchemaInput } from "./schema/define";
export {
  preValidator,
  postValidator,
  fieldValidator,
  preModelValidator,
  postModelValidator,
} from "./schema/validators";
export type {
  SiblingValues,
  FieldValidatorContext,
  PreFieldValidator,
  PostFieldValidator,
  FieldValidator,
  SchemaFieldValidator,
  ModelData,
  PreModelValidator,
  PostModelValidator,
  ModelValidator,
  ValidatorOptions,
} from "./schema/validators";
export { ok, reject } from "./schema/outcome";
export type { Accepted, Rejection, Outcome } from "./schema/outcome";
export type { InferType, InferFields, InferSchema } from "./schema/infer";

// Compilation
export { compile, mergeSchema } from "./compiler/compiler";
export type { CompiledField, DefaultPolicy, ValidationPlan } from "./compiler/plan";

// Validation
export { coerce } from "./coercion/coercer";
export type { CoerceContext, CoercionResult } from "./coercion/coercer";
export { checkConstraints, MULTIPLE_OF_EPSILON } from "./constraints/checker";
export { runFieldPipeline } from "./pipeline/field-pipeline";
export type { FieldOutcome, FieldState } from "./pipeline/field-pipeline";
export { validate, runPlan } from "./engine/engine";
export type { ValidatedRecord } from "./engine/engine";
export { readEngineEnv, resolveEngineConfig, DEFAULT_MAX_DEPTH } from "./engine/config";
export type { EngineOptions, EngineConfig, EngineEnv } from "./engine/config";

// Reporting
export { reportErrors, formatErrors, errorsByPath } from "./reporter/reporter";

// Errors
export { FormworkError, CompileError, ValidationException } from "./errors/formwork-error";

// Model
export { Model, model } from "./model/model";
export type { ModelOptions, Infer } from "./model/model";
