import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: "0.0.0.0",
      dataDir: "data",
      backupRetention: 5,
      autosave: true,
      logLevel: "info",
      search: { defaultLimit: 10, maxLimit: 100 },
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      DATA_DIR: "/var/lib/termindex",
      BACKUP_RETENTION: "3",
      AUTOSAVE: "0",
      LOG_LEVEL: "debug",
      SEARCH_MAX_LIMIT: "50",
    });

    expect(config.port).toBe(8080);
    expect(config.dataDir).toBe("/var/lib/termindex");
    expect(config.backupRetention).toBe(3);
    expect(config.autosave).toBe(false);
    expect(config.logLevel).toBe("debug");
    expect(config.search).toEqual({ defaultLimit: 10, maxLimit: 50 });
  });

  it("rejects malformed values", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ConfigError);
    expect(() => loadConfig({ BACKUP_RETENTION: "0" })).toThrow(ConfigError);
  });

  it("rejects a default limit above the maximum", () => {
    expect(() => loadConfig({ SEARCH_DEFAULT_LIMIT: "20", SEARCH_MAX_LIMIT: "10" })).toThrow(
      "invalid configuration: SEARCH_DEFAULT_LIMIT: must not exceed SEARCH_MAX_LIMIT",
    );
  });
});
