/**
 * Process-level configuration.
 *
 * Role in system:
 * - Single place that reads `process.env` (after `dotenv` loads `.env`).
 * - Values are validated with Zod; defaults live in the schema.
 *
 * Gotchas:
 * - `loadEnvConfig()` caches the first successful parse. Tests that tweak env vars pass
 *   their own record to `parseEnvConfig` instead.
 */
import "dotenv/config";
import { z } from "zod";

const BooleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const optionalText = z
  .string()
  .transform((value) => value.trim())
  .transform((value) => (value.length ? value : undefined))
  .optional();

const EnvSchema = z.object({
  CATALOG_BACKEND: z.enum(["mongo", "memory"]).default("mongo"),
  MONGO_URI: optionalText,
  DB_URI: optionalText,
  DB_NAME: z.string().min(1).default("craftbook"),
  MONGO_TRANSACTIONS: BooleanFlag.default("true"),
  APP_VERSION: z.string().min(1).default("0.1.0"),
  IMPORT_MERGE_STRATEGY: z.enum(["update", "replace", "skip"]).default("update"),
});

export type CatalogBackend = "mongo" | "memory";

export interface EnvConfig {
  readonly catalogBackend: CatalogBackend;
  readonly mongoUri: string | undefined;
  readonly dbName: string;
  readonly mongoTransactions: boolean;
  readonly appVersion: string;
  readonly importMergeStrategy: "update" | "replace" | "skip";
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly details: readonly string[] = [],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Validate an env record. Throws `ConfigError` listing every invalid key.
 */
export function parseEnvConfig(env: Record<string, string | undefined>): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid environment configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const data = parsed.data;
  return {
    catalogBackend: data.CATALOG_BACKEND,
    mongoUri: data.MONGO_URI ?? data.DB_URI,
    dbName: data.DB_NAME,
    mongoTransactions: data.MONGO_TRANSACTIONS,
    appVersion: data.APP_VERSION,
    importMergeStrategy: data.IMPORT_MERGE_STRATEGY,
  };
}

let cached: EnvConfig | null = null;

export function loadEnvConfig(): EnvConfig {
  if (!cached) cached = parseEnvConfig(process.env);
  return cached;
}

/** Drops the cached config so the next `loadEnvConfig()` re-reads `process.env`. */
export function resetEnvConfigForTests(): void {
  cached = null;
}
