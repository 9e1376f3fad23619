import { existsSync, mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLogger, parseLogLevel } from "./logger.js";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("createLogger", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.CATEGORY_TREE_LOG_LEVEL;
    delete process.env.CATEGORY_TREE_LOG_FILE;
    delete process.env.CATEGORY_TREE_LOG_RESET;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe("defaults", () => {
    it("uses warn level, pretty output and the package name", () => {
      const logger = createLogger();

      expect(logger.settings.minLevel).toBe(4);
      expect(logger.settings.type).toBe("pretty");
      expect(logger.settings.name).toBe("category-tree");
    });
  });

  describe("options", () => {
    it("respects minLevel, type and name", () => {
      const logger = createLogger({ minLevel: 2, type: "json", name: "tree:test" });

      expect(logger.settings.minLevel).toBe(2);
      expect(logger.settings.type).toBe("json");
      expect(logger.settings.name).toBe("tree:test");
    });

    it("hides the log position unless pretty", () => {
      expect(createLogger({ type: "json" }).settings.hideLogPositionForProduction).toBe(true);
      expect(createLogger({ type: "pretty" }).settings.hideLogPositionForProduction).toBe(false);
    });
  });

  describe("environment variables", () => {
    it("reads CATEGORY_TREE_LOG_LEVEL", () => {
      process.env.CATEGORY_TREE_LOG_LEVEL = "debug";

      expect(createLogger().settings.minLevel).toBe(2);
    });

    it("prefers the minLevel option over the environment", () => {
      process.env.CATEGORY_TREE_LOG_LEVEL = "debug";

      expect(createLogger({ minLevel: 5 }).settings.minLevel).toBe(5);
    });

    it("writes JSON lines to CATEGORY_TREE_LOG_FILE and hides console output", async () => {
      const dir = mkdtempSync(join(tmpdir(), "category-tree-log-"));
      const file = join(dir, "nested", "tree.log");
      process.env.CATEGORY_TREE_LOG_FILE = file;

      const logger = createLogger();
      logger.warn("pruned empty category");
      await sleep(100);

      expect(logger.settings.type).toBe("hidden");
      expect(existsSync(file)).toBe(true);
      expect(readFileSync(file, "utf8")).toContain("pruned empty category");
    });
  });
});

describe("parseLogLevel", () => {
  it.each<{ value: string | undefined; expected: number | undefined }>([
    { value: "silly", expected: 0 },
    { value: "trace", expected: 1 },
    { value: "DEBUG", expected: 2 },
    { value: "info", expected: 3 },
    { value: "warn", expected: 4 },
    { value: "error", expected: 5 },
    { value: "fatal", expected: 6 },
    { value: "3", expected: 3 },
    { value: "10", expected: 6 },
    { value: "-1", expected: 0 },
    { value: "2.7", expected: 2 },
    { value: "   ", expected: undefined },
    { value: "", expected: undefined },
    { value: "loud", expected: undefined },
    { value: undefined, expected: undefined },
  ])("parses $value as $expected", ({ value, expected }) => {
    expect(parseLogLevel(value)).toBe(expected);
  });
});
