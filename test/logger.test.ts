import { describe, expect, it } from "vitest";
import { createLogger, logger } from "../src/conductor/logger.js";

describe("logger", () => {
  it("is silent under tests", () => {
    expect(logger.level).toBe("silent");
  });

  it("tags child loggers with their module", () => {
    expect(createLogger("store").bindings()).toMatchObject({ module: "store" });
  });
});
