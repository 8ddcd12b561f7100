export type Accepted<T> = { ok: true; value: T };

export type Rejection = { ok: false; message: string; code: string };

/**
 * What a validator, custom type or default hook hands back to the engine.
 * Rejections are values so independent fields keep aggregating.
 */
export type Outcome<T> = Accepted<T> | Rejection;

export function ok<T>(value: T): Accepted<T> {
  return { ok: true, value };
}

export function reject(message: string, code = "value_error"): Rejection {
  return { ok: false, message, code };
}

/** Runs a hook, turning anything it throws into a rejection. */
export function attempt<T>(hook: () => Outcome<T>): Outcome<T> {
  try {
    return hook();
  } catch (error) {
    return reject(error instanceof Error ? error.message : String(error));
  }
}
