/**
 * Shared utility functions used across the codebase.
 *
 * @module utils
 */

/**
 * Type guard to check if a value is a non-null object (Record).
 *
 * @param v - Value to check
 * @returns true if v is a non-null, non-array object
 */
export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Type guard to check if a value is a non-empty string.
 *
 * @param v - Value to check
 * @returns true if v is a string with length > 0 after trimming
 */
export function isNonEmptyString(v: unknown): v is string {
  return typeof v === "string" && v.trim().length > 0;
}

/**
 * Type guard for strictly positive integers (timeouts, limits).
 */
export function isPositiveInteger(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v > 0;
}

/**
 * Render an unknown thrown value as a single-line message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
