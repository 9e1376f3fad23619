/**
 * Error utilities for category-tree.
 */

/**
 * Thrown when an operation receives an argument it cannot work with,
 * such as a missing or empty category name.
 *
 * Raised synchronously, before the target category is modified.
 *
 * @example
 * ```typescript
 * try {
 *   root.addChild("");
 * } catch (error) {
 *   if (isInvalidArgumentError(error)) {
 *     console.log(`Bad ${error.argument}: ${error.message}`);
 *   }
 * }
 * ```
 */
export class InvalidArgumentError extends Error {
  /** Name of the offending parameter */
  public readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}

/**
 * Detects an {@link InvalidArgumentError}, including ones created by another
 * copy of this package (matched by error name).
 *
 * @param error - The error to check
 * @returns `true` if the error is an invalid-argument error
 */
export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  if (error instanceof InvalidArgumentError) return true;
  if (!(error instanceof Error)) return false;

  return error.name === "InvalidArgumentError" && "argument" in error;
}
