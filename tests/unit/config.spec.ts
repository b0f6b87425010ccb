import { test, expect } from "@playwright/test";
import { loadConfig } from "../../src/config";
import { ConfigError } from "../../src/errors";

test.describe("Configuration", () => {
  test("should default to warnings only", () => {
    expect(loadConfig({})).toEqual({ logLevel: "warn" });
  });

  test("should read LOG_LEVEL", () => {
    expect(loadConfig({ LOG_LEVEL: "debug" })).toEqual({ logLevel: "debug" });
  });

  test("should treat an empty LOG_LEVEL as unset", () => {
    expect(loadConfig({ LOG_LEVEL: "" })).toEqual({ logLevel: "warn" });
  });

  test("should reject an unknown level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(/^Invalid configuration: LOG_LEVEL: /);
  });
});
