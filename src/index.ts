/**
 * Motivación: punto de entrada de la librería de import/export del catálogo.
 *
 * Idea/concepto: arma el backend configurado (Mongo o memoria) y expone las cuatro
 * operaciones de alto nivel que devuelven `true`/`false`, más el servicio estructurado
 * para quien necesite los resultados por registro.
 *
 * Alcance: wiring y logging de errores; las reglas viven en `@/modules/transfer`.
 */
import { loadEnvConfig, type EnvConfig } from "@/configuration/env";
import { createMongoCatalogRepo } from "@/db";
import { createMemoryCatalogRepo, type CatalogRepo } from "@/modules/catalog";
import { TransferService, type TransferError } from "@/modules/transfer";
import { isMergeStrategy } from "@/modules/transfer/types";
import { toError, type Result } from "@/utils/result";

export type { CatalogRepo } from "@/modules/catalog";
export { disconnectDb } from "@/db";
export type {
  ExportSummary,
  ImportSummary,
  MergeStrategy,
  RecordOutcome,
  TransferFormat,
} from "@/modules/transfer/types";
export { TransferService, TransferError } from "@/modules/transfer";

export function createCatalogRepo(config: EnvConfig = loadEnvConfig()): CatalogRepo {
  if (config.catalogBackend === "memory") return createMemoryCatalogRepo();
  return createMongoCatalogRepo({ useTransactions: config.mongoTransactions });
}

let defaultRepo: CatalogRepo | null = null;

function getDefaultRepo(): CatalogRepo {
  if (!defaultRepo) defaultRepo = createCatalogRepo();
  return defaultRepo;
}

export function createTransferService(repo: CatalogRepo = getDefaultRepo()): TransferService {
  return new TransferService(repo, { appVersion: loadEnvConfig().appVersion });
}

async function succeeded<T>(
  operation: string,
  run: () => Promise<Result<T, TransferError>>,
): Promise<boolean> {
  try {
    const result = await run();
    if (result.isErr()) {
      console.error(`[transfer] ${operation} failed (${result.error.code}): ${result.error.message}`);
      return false;
    }
    return true;
  } catch (error) {
    console.error(`[transfer] ${operation} failed:`, toError(error));
    return false;
  }
}

/**
 * Imports a JSON/Markdown file or a CSV bundle. `true` when the source was read and
 * every record was processed, even if some records failed.
 */
export async function importData(
  source: string,
  format: string,
  strategy?: string,
): Promise<boolean> {
  return succeeded("import", () => {
    const chosen = strategy?.trim().toLowerCase() ?? loadEnvConfig().importMergeStrategy;
    if (!isMergeStrategy(chosen)) {
      throw new Error(`unknown merge strategy "${strategy}" (expected update, replace or skip)`);
    }
    return createTransferService().importData(source, format, chosen);
  });
}

export async function exportData(destination: string, format: string): Promise<boolean> {
  return succeeded("export", () => createTransferService().exportData(destination, format));
}

export async function exportResources(destination: string, format: string): Promise<boolean> {
  return succeeded("resource export", () =>
    createTransferService().exportResources(destination, format),
  );
}

export async function exportRecipes(destination: string, format: string): Promise<boolean> {
  return succeeded("recipe export", () =>
    createTransferService().exportRecipes(destination, format),
  );
}
