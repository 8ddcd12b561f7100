export type {
  Schema,
  PathSegment,
  ErrorKind,
  FieldError,
  ValidationResult,
} from "./validation";

export type { LogLevel, Logger } from "./logger";
