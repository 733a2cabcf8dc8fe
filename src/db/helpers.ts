/**
 * Motivation: Share data layer specific utilities without replicating them in every repository.
 *
 * Concept: Pure functions that help clone documents and classify driver errors.
 *
 * Scope: Complementary support; does not open connections or perform queries on its own.
 */

/**
 * Create a deep copy of the provided value so callers can mutate it safely.
 * Stored catalog shapes are plain data (strings, numbers, booleans, Dates, arrays).
 */
export function deepClone<T>(value: T): T {
  return structuredClone(value);
}

const DUPLICATE_KEY_CODE = 11000;

/**
 * Whether a driver error is a unique-index violation (E11000).
 */
export function isDuplicateKeyError(error: unknown): boolean {
  if (!error || typeof error !== "object") return false;
  return "code" in error && error.code === DUPLICATE_KEY_CODE;
}
