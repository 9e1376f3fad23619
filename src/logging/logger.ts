import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";
import { parseEnvBoolean } from "../utils/config-resolver.js";

/**
 * tslog level names, in ascending severity.
 */
export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

/**
 * Parses a log level given either by name ("debug") or by number ("2").
 * Numbers are clamped to the 0..6 range tslog understands.
 */
export function parseLogLevel(value?: string): number | undefined {
  if (!value) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "") {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(LOG_LEVELS.length - 1, Math.floor(numericLevel)));
  }

  const index = LOG_LEVELS.findIndex((level) => level === normalized);
  return index === -1 ? undefined : index;
}

/**
 * Logger configuration options for category-tree.
 */
export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn)
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' for development, 'json' for machine consumption
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /**
   * Logger name (appears in logs)
   */
  name?: string;

  /**
   * Truncate CATEGORY_TREE_LOG_FILE instead of appending to it.
   * @default false
   */
  logReset?: boolean;
}

function openLogFile(path: string, reset: boolean): WriteStream | undefined {
  try {
    mkdirSync(dirname(path), { recursive: true });
    return createWriteStream(path, { flags: reset ? "w" : "a" });
  } catch (error) {
    console.error("Failed to initialize CATEGORY_TREE_LOG_FILE output:", error);
    return undefined;
  }
}

/**
 * Create a new logger for category-tree.
 *
 * Environment variables fill in whatever the options leave out:
 * `CATEGORY_TREE_LOG_LEVEL`, `CATEGORY_TREE_LOG_FILE` (JSON lines, console
 * output is then hidden) and `CATEGORY_TREE_LOG_RESET`.
 *
 * @example
 * ```typescript
 * // Development logger with pretty output
 * const logger = createLogger({ type: 'pretty', minLevel: 2 });
 *
 * // Silent logger for tests
 * const quiet = createLogger({ type: 'hidden' });
 *
 * // Hand it to a tree; children inherit it
 * const root = createCategory("Root", { logger });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const envLogFile = process.env.CATEGORY_TREE_LOG_FILE?.trim() ?? "";

  const minLevel = options.minLevel ?? parseLogLevel(process.env.CATEGORY_TREE_LOG_LEVEL) ?? 4;
  const name = options.name ?? "category-tree";
  const logReset = options.logReset ?? parseEnvBoolean(process.env.CATEGORY_TREE_LOG_RESET) ?? false;

  const logFileStream = envLogFile ? openLogFile(envLogFile, logReset) : undefined;
  const type = logFileStream ? "hidden" : (options.type ?? "pretty");

  const logger = new Logger<ILogObj>({
    name,
    minLevel,
    type,
    hideLogPositionForProduction: type !== "pretty",
    prettyLogTemplate:
      type === "pretty"
        ? "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}} {{logLevelName}} [{{name}}] "
        : undefined,
  });

  if (logFileStream) {
    logger.attachTransport((logObj) => {
      logFileStream.write(`${JSON.stringify(logObj)}\n`);
    });
  }

  return logger;
}

/**
 * Shared logger used by categories created without a `logger` option.
 */
export const defaultLogger = createLogger();
