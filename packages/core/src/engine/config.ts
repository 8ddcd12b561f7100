import type { ExtraPolicy } from "../schema/define";

export type EngineOptions = {
  /** Maximum nested model depth before input is rejected. */
  maxDepth?: number;
  /** Extra-field policy for schemas that do not declare one. Defaults to `"ignore"`. */
  defaultExtra?: ExtraPolicy;
};

export type EngineConfig = {
  maxDepth: number;
  defaultExtra: ExtraPolicy;
};

export type EngineEnv = {
  maxDepth: number;
};

export const DEFAULT_MAX_DEPTH = 32;

export function readEngineEnv(): EngineEnv {
  const rawDepth = Number(process.env.FORMWORK_MAX_DEPTH);
  return {
    maxDepth: Number.isInteger(rawDepth) && rawDepth > 0 ? rawDepth : DEFAULT_MAX_DEPTH,
  };
}

/**
 * Fills in unset options. Only the depth bound falls back to the
 * environment; the extra-field policy is never read from it.
 */
export function resolveEngineConfig(options: EngineOptions = {}): EngineConfig {
  return {
    maxDepth: options.maxDepth ?? readEngineEnv().maxDepth,
    defaultExtra: options.defaultExtra ?? "ignore",
  };
}
