/**
 * Type guard utilities to reduce type assertions and improve type safety.
 * These guards provide runtime type checking with TypeScript type narrowing.
 */

/**
 * Type guard to check if a value is a non-null object (excluding arrays).
 * Narrows the type to Record<string, unknown> for safe property access.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Type guard to check if a value is a string.
 */
export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

/**
 * Safely access a property on an unknown value.
 * Returns undefined if the value is not an object or the property doesn't exist.
 */
export function getProperty(value: unknown, key: string): unknown {
  if (isRecord(value)) {
    return value[key];
  }
  return undefined;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
