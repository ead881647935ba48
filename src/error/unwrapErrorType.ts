/** Constructor of an error class, used to match errors along a cause chain. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 * Stops on cause cycles.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<Error>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
