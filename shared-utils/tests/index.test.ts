import { describe, expect, it } from "vitest";
import * as utils from "../src";
import * as cacheModule from "../src/cache";

describe("shared-utils exports", () => {
  it("should expose the helpers the services use", () => {
    expect(typeof utils.cached).toBe("function");
    expect(typeof utils.createLogger).toBe("function");
    expect(typeof utils.parseEnvNumber).toBe("function");
  });

  it("should not expose retired helpers", () => {
    expect(utils).not.toHaveProperty("VERSION");
    expect(utils).not.toHaveProperty("validateRequiredEnv");
    expect(cacheModule).not.toHaveProperty("default");
  });
});
