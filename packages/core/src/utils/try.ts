/** What a caught error is reduced to at every boundary of the core */
export type TryError = { message: string; stack?: string };

type TrySuccess<T> = [null, T];
type TryFailure = [TryError, null];
export type TryResult<T> = Promise<TrySuccess<T> | TryFailure>;

export function normalizeError(error: unknown): TryError {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

/** Message of a caught value, for result unions and log lines */
export function describeError(error: unknown): string {
  return normalizeError(error).message;
}

/**
 * Run a sync or async call and settle it into a `[error, value]` tuple.
 * A synchronous throw and a rejection land in the same slot.
 */
export default async function $try<T>(fn: () => Promise<T> | T): TryResult<T> {
  try {
    return [null, await fn()];
  } catch (error) {
    return [normalizeError(error), null];
  }
}
