import type { ILogObj, Logger } from "tslog";
import { defaultLogger } from "../logging/logger.js";
import { parseEnvChoice, resolveValue } from "../utils/config-resolver.js";
import { LISTENER_ERROR_POLICIES, LISTENER_ERRORS_ENV_VAR } from "./constants.js";
import { validateCategoryOptions } from "./validation.js";

/**
 * Decides whether two elements are the same element.
 * Used to de-duplicate on add and to find elements on remove.
 */
export type ElementEquality<T> = (a: T, b: T) => boolean;

/**
 * What happens when a listener throws during notification.
 *
 * - `propagate`: the error escapes the mutating call and the remaining
 *   listeners for that event are not notified. The mutation itself stays applied.
 * - `log`: the error is logged and the next listener is notified.
 */
export type ListenerErrorPolicy = (typeof LISTENER_ERROR_POLICIES)[number];

export interface CategoryOptions<T> {
  /**
   * Element equality.
   * @default SameValueZero (`===`, except that NaN equals NaN)
   */
  equals?: ElementEquality<T>;
  /** Logger for attach/detach and dispatch diagnostics */
  logger?: Logger<ILogObj>;
  /**
   * Listener failure policy.
   * @default "propagate", or CATEGORY_TREE_LISTENER_ERRORS when set
   */
  listenerErrors?: ListenerErrorPolicy;
}

export interface ResolvedCategoryOptions<T> {
  readonly equals: ElementEquality<T>;
  readonly logger: Logger<ILogObj>;
  readonly listenerErrors: ListenerErrorPolicy;
}

export function sameValueZero(a: unknown, b: unknown): boolean {
  // NaN is the only value not equal to itself
  return a === b || (a !== a && b !== b);
}

/**
 * Validates options and fills in defaults.
 *
 * @throws InvalidArgumentError if an option has the wrong shape
 */
export function resolveCategoryOptions<T>(options: CategoryOptions<T> = {}): ResolvedCategoryOptions<T> {
  validateCategoryOptions(options);

  return {
    equals: options.equals ?? sameValueZero,
    logger: options.logger ?? defaultLogger,
    listenerErrors: resolveValue<ListenerErrorPolicy>({
      explicit: options.listenerErrors,
      envVar: LISTENER_ERRORS_ENV_VAR,
      parseEnv: parseEnvChoice(LISTENER_ERROR_POLICIES),
      defaultValue: "propagate",
    }),
  };
}
