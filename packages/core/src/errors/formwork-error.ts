import type { FieldError } from "@formwork/types";
import { formatErrors } from "../reporter/reporter";

export class FormworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FormworkError";
  }
}

/**
 * A schema declaration that cannot be compiled. Raised eagerly when the
 * schema is registered; never produced by bad input data.
 */
export class CompileError extends FormworkError {
  constructor(
    public readonly schema: string,
    public readonly details: readonly string[],
  ) {
    super(`Schema "${schema}" is invalid:\n\n${details.map((d) => `  ${d}`).join("\n")}`);
    this.name = "CompileError";
  }
}

/** Thrown by `Model.parse()` when input does not validate. */
export class ValidationException extends FormworkError {
  constructor(
    public readonly schema: string,
    public readonly errors: readonly FieldError[],
  ) {
    super(formatErrors(schema, errors));
    this.name = "ValidationException";
  }

  toJSON(): { name: string; schema: string; errors: readonly FieldError[] } {
    return { name: this.name, schema: this.schema, errors: this.errors };
  }
}
