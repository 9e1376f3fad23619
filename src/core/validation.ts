/**
 * Argument validation backed by zod schemas.
 *
 * @module core/validation
 */

import { type ILogObj, Logger } from "tslog";
import { type ZodError, z } from "zod";
import { LISTENER_ERROR_POLICIES } from "./constants.js";
import { InvalidArgumentError } from "./errors.js";

const categoryNameSchema = z
  .string({ message: "must be a string" })
  .min(1, { message: "may not be empty" });

const categoryOptionsSchema = z.object({
  equals: z
    .custom<(a: unknown, b: unknown) => boolean>((value) => typeof value === "function", {
      message: "must be a function",
    })
    .optional(),
  logger: z
    .custom<Logger<ILogObj>>((value) => value instanceof Logger, {
      message: "must be a tslog Logger",
    })
    .optional(),
  listenerErrors: z.enum(LISTENER_ERROR_POLICIES).optional(),
});

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")} ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Asserts that `value` is usable as a category name: a non-empty string.
 *
 * @param value - The value to check
 * @param argument - Parameter name reported in the error
 * @throws InvalidArgumentError when the value is absent, not a string, or empty
 */
export function assertCategoryName(value: unknown, argument = "name"): asserts value is string {
  const result = categoryNameSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(argument, `The ${argument} ${describeIssues(result.error)}`);
  }
}

/**
 * @throws InvalidArgumentError when `options` is not an object or an option has the wrong shape
 */
export function validateCategoryOptions(options: unknown): void {
  const result = categoryOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidArgumentError("options", `Invalid category options: ${describeIssues(result.error)}`);
  }
}
