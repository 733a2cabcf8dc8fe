import { afterEach, describe, expect, it, vi } from "vitest";
import {
  ConfigError,
  loadEnvConfig,
  parseEnvConfig,
  resetEnvConfigForTests,
} from "@/configuration/env";

describe("parseEnvConfig", () => {
  it("applies defaults", () => {
    expect(parseEnvConfig({})).toEqual({
      catalogBackend: "mongo",
      mongoUri: undefined,
      dbName: "craftbook",
      mongoTransactions: true,
      appVersion: "0.1.0",
      importMergeStrategy: "update",
    });
  });

  it("prefers MONGO_URI and falls back to DB_URI", () => {
    expect(parseEnvConfig({ DB_URI: "mongodb://fallback" }).mongoUri).toBe("mongodb://fallback");
    expect(
      parseEnvConfig({ MONGO_URI: "mongodb://primary", DB_URI: "mongodb://fallback" }).mongoUri,
    ).toBe("mongodb://primary");
    expect(parseEnvConfig({ MONGO_URI: "  ", DB_URI: "mongodb://fallback" }).mongoUri).toBe(
      "mongodb://fallback",
    );
  });

  it("reads flags and strategies", () => {
    const config = parseEnvConfig({
      CATALOG_BACKEND: "memory",
      MONGO_TRANSACTIONS: "false",
      IMPORT_MERGE_STRATEGY: "replace",
    });

    expect(config.catalogBackend).toBe("memory");
    expect(config.mongoTransactions).toBe(false);
    expect(config.importMergeStrategy).toBe("replace");
  });

  it("lists every invalid key", () => {
    let thrown: unknown = null;
    try {
      parseEnvConfig({ CATALOG_BACKEND: "postgres", IMPORT_MERGE_STRATEGY: "merge" });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigError);
    const details = thrown instanceof ConfigError ? thrown.details : [];
    expect(details).toHaveLength(2);
    expect(details[0].startsWith("CATALOG_BACKEND:")).toBe(true);
    expect(details[1].startsWith("IMPORT_MERGE_STRATEGY:")).toBe(true);
  });
});

describe("loadEnvConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnvConfigForTests();
  });

  it("caches the parsed environment until it is reset", () => {
    vi.stubEnv("APP_VERSION", "1.2.3");
    resetEnvConfigForTests();
    expect(loadEnvConfig().appVersion).toBe("1.2.3");

    vi.stubEnv("APP_VERSION", "2.0.0");
    expect(loadEnvConfig().appVersion).toBe("1.2.3");

    resetEnvConfigForTests();
    expect(loadEnvConfig().appVersion).toBe("2.0.0");
  });
});
