import type { Logger, Schema, ValidationResult } from "@formwork/types";
import { NOOP_LOGGER } from "@formwork/logger";
import { compile } from "../compiler/compiler";
import type { ValidationPlan } from "../compiler/plan";
import { validate } from "../engine/engine";
import { resolveEngineConfig, type EngineConfig, type EngineOptions } from "../engine/config";
import { ValidationException } from "../errors/formwork-error";
import type { SchemaDefinition } from "../schema/define";
import type { InferSchema } from "../schema/infer";

export type ModelOptions = EngineOptions & {
  logger?: Logger;
};

/**
 * A compiled schema bound to engine options. Compilation happens in the
 * constructor, so an invalid declaration fails where the model is created.
 */
export class Model<T> implements Schema<T> {
  readonly plan: ValidationPlan;
  private readonly logger: Logger;
  /** Resolved once, so every call on this model uses the same limits and policy. */
  readonly config: EngineConfig;

  constructor(
    readonly schema: SchemaDefinition,
    options: ModelOptions = {},
  ) {
    const { logger, ...engineOptions } = options;
    this.plan = compile(schema);
    this.logger = (logger ?? NOOP_LOGGER).child("formwork.model", { schema: schema.name });
    this.config = resolveEngineConfig(engineOptions);
  }

  get name(): string {
    return this.plan.name;
  }

  /** Field names in declaration order, parents first. */
  get fields(): readonly string[] {
    return this.plan.declarationOrder;
  }

  validate(raw: unknown): ValidationResult<T> {
    const result = validate(this.plan, raw, this.config);
    if (!result.success) {
      this.logger.debug("validation failed", { errorCount: result.errors.length });
    }
    // The plan was compiled from the schema T is inferred from.
    return result as ValidationResult<T>;
  }

  safeParse(raw: unknown): ValidationResult<T> {
    return this.validate(raw);
  }

  /** @throws ValidationException carrying every error found. */
  parse(raw: unknown): T {
    const result = this.validate(raw);
    if (!result.success) {
      throw new ValidationException(this.name, result.errors);
    }
    return result.data;
  }
}

export function model<S extends SchemaDefinition>(schema: S, options?: ModelOptions): Model<InferSchema<S>> {
  return new Model<InferSchema<S>>(schema, options);
}

/** The record type a model or schema produces. */
export type Infer<X> = X extends Model<infer T> ? T : InferSchema<X>;
