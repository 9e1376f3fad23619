/**
 * Config resolution helpers.
 *
 * Settings are resolved through a fixed priority chain:
 * 1. Explicit option passed in code
 * 2. Environment variable
 * 3. Package default
 *
 * @module utils/config-resolver
 */

/**
 * Options for resolving a single config value.
 */
export interface ResolveValueOptions<T> {
  /** Explicit value from code (highest priority) */
  explicit?: T;
  /** Environment variable to consult when no explicit value is given */
  envVar?: string;
  /** Turns the raw environment string into a value, or undefined when unusable */
  parseEnv?: (raw: string) => T | undefined;
  /** Default value (lowest priority) */
  defaultValue: T;
}

/**
 * Parses a boolean environment variable ("true"/"1", "false"/"0").
 */
export function parseEnvBoolean(value?: string): boolean | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

/**
 * Builds a parser that accepts one of a fixed set of strings, case-insensitively.
 *
 * @example
 * ```typescript
 * const parse = parseEnvChoice(["propagate", "log"] as const);
 * parse(" LOG "); // "log"
 * parse("other"); // undefined
 * ```
 */
export function parseEnvChoice<C extends string>(choices: readonly C[]): (raw: string) => C | undefined {
  return (raw) => {
    const normalized = raw.trim().toLowerCase();
    return choices.find((choice) => choice === normalized);
  };
}

/**
 * Resolve a single configuration value through the priority chain.
 *
 * @example
 * ```typescript
 * const listenerErrors = resolveValue({
 *   explicit: options.listenerErrors,
 *   envVar: "CATEGORY_TREE_LISTENER_ERRORS",
 *   parseEnv: parseEnvChoice(["propagate", "log"] as const),
 *   defaultValue: "propagate",
 * });
 * ```
 */
export function resolveValue<T>(options: ResolveValueOptions<T>): T {
  const { explicit, envVar, parseEnv, defaultValue } = options;

  if (explicit !== undefined) {
    return explicit;
  }

  if (envVar && parseEnv) {
    const raw = process.env[envVar];
    if (raw !== undefined) {
      const parsed = parseEnv(raw);
      if (parsed !== undefined) {
        return parsed;
      }
    }
  }

  return defaultValue;
}
