import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to the bundled file locations", () => {
    expect(loadConfig({})).toEqual({
      DB_FILE: "./data/smartnus.sqlite",
      SEED_FILE: "./data/sample-questions.json",
    });
  });

  it("takes values from the environment", () => {
    const config = loadConfig({ DB_FILE: "/tmp/bank.sqlite", LOG_LEVEL: "debug" });

    expect(config.DB_FILE).toBe("/tmp/bank.sqlite");
    expect(config.LOG_LEVEL).toBe("debug");
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ZodError);
  });
});
