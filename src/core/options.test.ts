import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLogger, defaultLogger } from "../logging/logger.js";
import { LISTENER_ERRORS_ENV_VAR } from "./constants.js";
import { InvalidArgumentError } from "./errors.js";
import { resolveCategoryOptions, sameValueZero } from "./options.js";

describe("resolveCategoryOptions", () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env[LISTENER_ERRORS_ENV_VAR];
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it("fills in defaults", () => {
    const resolved = resolveCategoryOptions<number>();

    expect(resolved.equals).toBe(sameValueZero);
    expect(resolved.logger).toBe(defaultLogger);
    expect(resolved.listenerErrors).toBe("propagate");
  });

  it("keeps explicit options", () => {
    const equals = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();
    const logger = createLogger({ type: "hidden" });

    const resolved = resolveCategoryOptions<string>({ equals, logger, listenerErrors: "log" });

    expect(resolved.equals).toBe(equals);
    expect(resolved.logger).toBe(logger);
    expect(resolved.listenerErrors).toBe("log");
  });

  it("reads the listener error policy from the environment", () => {
    process.env[LISTENER_ERRORS_ENV_VAR] = " LOG ";

    expect(resolveCategoryOptions().listenerErrors).toBe("log");
  });

  it("prefers the explicit policy over the environment", () => {
    process.env[LISTENER_ERRORS_ENV_VAR] = "log";

    expect(resolveCategoryOptions({ listenerErrors: "propagate" }).listenerErrors).toBe("propagate");
  });

  it("ignores unknown policies in the environment", () => {
    process.env[LISTENER_ERRORS_ENV_VAR] = "swallow";

    expect(resolveCategoryOptions().listenerErrors).toBe("propagate");
  });

  it("rejects a logger that is not a tslog Logger", () => {
    const options = { logger: { error: () => undefined } };

    expect(() => resolveCategoryOptions(options as never)).toThrow(InvalidArgumentError);
  });

  it("rejects a non-object", () => {
    expect(() => resolveCategoryOptions("log" as never)).toThrow("Invalid category options");
  });
});

describe("sameValueZero", () => {
  it("compares primitives by value and objects by identity", () => {
    const object = {};

    expect(sameValueZero(1, 1)).toBe(true);
    expect(sameValueZero("a", "a")).toBe(true);
    expect(sameValueZero(0, -0)).toBe(true);
    expect(sameValueZero(Number.NaN, Number.NaN)).toBe(true);
    expect(sameValueZero(object, object)).toBe(true);
    expect(sameValueZero({}, {})).toBe(false);
    expect(sameValueZero(1, "1")).toBe(false);
  });
});
