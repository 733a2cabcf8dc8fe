/**
 * Import/export pipelines.
 *
 * Purpose: Filesystem-facing orchestration. Reads the catalog and writes a document, or
 * reads a document and hands the decoded batch to the reconciliation engine.
 *
 * Context: Callers get `Result<Summary, TransferError>`; codec and IO failures abort the
 * call, record failures only show up in `ImportSummary.outcomes`.
 */

import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { CatalogRepo } from "@/modules/catalog/repository";
import type { CraftingRecipe, Resource } from "@/modules/catalog/types";
import { ErrResult, OkResult, toError, type Result } from "@/utils/result";
import {
  RECIPES_CSV,
  RESOURCES_CSV,
  decodeCsvBundle,
  encodeRecipesCsv,
  encodeResourcesCsv,
  type CsvBundle,
} from "./codecs/csv";
import { decodeJsonDocument, encodeJsonDocument } from "./codecs/json";
import { decodeMarkdownDocument, encodeMarkdownDocument } from "./codecs/markdown";
import { CodecError, TransferError, TransferIOError } from "./errors";
import { reconcileRecipes, reconcileResources } from "./reconcile";
import {
  countOutcomes,
  isTransferFormat,
  type CatalogDocument,
  type DecodeResult,
  type ExportSummary,
  type ImportSummary,
  type MergeStrategy,
  type RecipeRecord,
  type RecordOutcome,
  type ResourceRecord,
  type TransferFormat,
} from "./types";

export interface TransferServiceOptions {
  /** Written into the export metadata. */
  readonly appVersion: string;
  readonly now?: () => Date;
}

type Scope = "all" | "resources" | "recipes";

/* ------------------------------ entity → record ----------------------------- */

export function resourceToRecord(resource: Resource): ResourceRecord {
  return {
    id: resource.id,
    name: resource.name,
    category: resource.category,
    rarity: resource.rarity,
    description: resource.description,
    sourceLocations: resource.sourceLocations,
    iconPath: resource.iconPath,
    discovered: resource.discovered,
    createdAt: resource.createdAt.toISOString(),
    updatedAt: resource.updatedAt.toISOString(),
  };
}

export function recipeToRecord(recipe: CraftingRecipe): RecipeRecord {
  return {
    id: recipe.id,
    name: recipe.name,
    description: recipe.description,
    outputItemName: recipe.outputItemName,
    outputQuantity: recipe.outputQuantity,
    craftingTimeSeconds: recipe.craftingTimeSeconds,
    requiredStation: recipe.requiredStation,
    skillRequirement: recipe.skillRequirement,
    iconPath: recipe.iconPath,
    discovered: recipe.discovered,
    ingredients: recipe.ingredients.map((ingredient) => ({
      resourceId: ingredient.resourceId,
      resourceName: ingredient.resourceName ?? undefined,
      quantity: ingredient.quantity,
    })),
    createdAt: recipe.createdAt.toISOString(),
    updatedAt: recipe.updatedAt.toISOString(),
  };
}

/* ---------------------------------- files ---------------------------------- */

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    throw new TransferIOError(`Could not read ${path}: ${toError(error).message}`, path);
  }
}

async function readOptionalText(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw new TransferIOError(`Could not read ${path}: ${toError(error).message}`, path);
  }
}

async function writeText(path: string, contents: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, contents, "utf8");
  } catch (error) {
    throw new TransferIOError(`Could not write ${path}: ${toError(error).message}`, path);
  }
}

/** A bundle directory, or a single `resources.csv` / `crafting_recipes.csv` file. */
async function readCsvSource(source: string): Promise<CsvBundle> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(source)).isDirectory();
  } catch (error) {
    throw new TransferIOError(`Could not read ${source}: ${toError(error).message}`, source);
  }

  if (isDirectory) {
    const bundle: CsvBundle = {
      resources: await readOptionalText(join(source, RESOURCES_CSV)),
      recipes: await readOptionalText(join(source, RECIPES_CSV)),
    };
    if (bundle.resources === undefined && bundle.recipes === undefined) {
      throw new TransferIOError(
        `CSV bundle ${source} contains neither ${RESOURCES_CSV} nor ${RECIPES_CSV}`,
        source,
      );
    }
    return bundle;
  }

  const file = basename(source).toLowerCase();
  if (file === RESOURCES_CSV) return { resources: await readText(source) };
  if (file === RECIPES_CSV) return { recipes: await readText(source) };
  throw new CodecError(`CSV file must be named ${RESOURCES_CSV} or ${RECIPES_CSV}`, [source]);
}

/* --------------------------------- service --------------------------------- */

export class TransferService {
  private readonly now: () => Date;

  constructor(
    private readonly repo: CatalogRepo,
    private readonly options: TransferServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Writes resources and recipes. CSV treats `destination` as the bundle directory. */
  exportData(destination: string, format: string): Promise<Result<ExportSummary, TransferError>> {
    return this.exportScope(destination, format, "all");
  }

  /** CSV writes a single file at `destination`. */
  exportResources(
    destination: string,
    format: string,
  ): Promise<Result<ExportSummary, TransferError>> {
    return this.exportScope(destination, format, "resources");
  }

  /** CSV writes a single file at `destination`. */
  exportRecipes(
    destination: string,
    format: string,
  ): Promise<Result<ExportSummary, TransferError>> {
    return this.exportScope(destination, format, "recipes");
  }

  /** Resources are reconciled before recipes so new ingredients can resolve. */
  importData(
    source: string,
    format: string,
    strategy: MergeStrategy,
  ): Promise<Result<ImportSummary, TransferError>> {
    return this.guard(async () => {
      const kind = requireFormat(format);
      const decoded = await this.decode(source, kind);
      for (const warning of decoded.warnings) {
        console.warn(`[transfer:${kind}] ${source}: ${warning}`);
      }

      const outcomes: RecordOutcome[] = decoded.rejected.map((rejected): RecordOutcome => {
        console.error(
          `[transfer:reconcile] ${rejected.kind} "${rejected.label}" failed: ${rejected.reason}`,
        );
        return {
          kind: rejected.kind,
          name: rejected.label,
          status: "failed",
          reason: rejected.reason,
          warnings: [],
        };
      });
      outcomes.push(...(await reconcileResources(this.repo, decoded.resources, strategy)));
      outcomes.push(...(await reconcileRecipes(this.repo, decoded.recipes, strategy)));

      const summary: ImportSummary = {
        source,
        format: kind,
        strategy,
        outcomes,
        counts: countOutcomes(outcomes),
        warnings: decoded.warnings,
      };
      const { created, updated, replaced, skipped, failed } = summary.counts;
      console.info(
        `[transfer] import ${source} (${kind}, ${strategy}): ${created} created, ${updated} updated, ${replaced} replaced, ${skipped} skipped, ${failed} failed`,
      );
      return summary;
    });
  }

  private async decode(source: string, format: TransferFormat): Promise<DecodeResult> {
    switch (format) {
      case "json":
        return decodeJsonDocument(await readText(source));
      case "markdown":
        return decodeMarkdownDocument(await readText(source));
      case "csv":
        return decodeCsvBundle(await readCsvSource(source));
    }
  }

  private exportScope(
    destination: string,
    format: string,
    scope: Scope,
  ): Promise<Result<ExportSummary, TransferError>> {
    return this.guard(async () => {
      const kind = requireFormat(format);
      const doc = await this.snapshot(scope);
      const files = await this.write(destination, kind, scope, doc);

      const summary: ExportSummary = {
        format: kind,
        files,
        totalResources: doc.resources?.length ?? 0,
        totalRecipes: doc.recipes?.length ?? 0,
      };
      console.info(
        `[transfer] exported ${summary.totalResources} resources and ${summary.totalRecipes} recipes to ${destination} (${kind})`,
      );
      return summary;
    });
  }

  private async snapshot(scope: Scope): Promise<CatalogDocument> {
    const resources =
      scope === "recipes"
        ? undefined
        : orAbort(await this.repo.listResources(), "resources").map(resourceToRecord);
    const recipes =
      scope === "resources"
        ? undefined
        : orAbort(await this.repo.listRecipes(), "recipes").map(recipeToRecord);

    return {
      metadata: {
        exportDate: this.now().toISOString(),
        appVersion: this.options.appVersion,
        totalResources: resources?.length ?? 0,
        totalRecipes: recipes?.length ?? 0,
      },
      resources,
      recipes,
    };
  }

  private async write(
    destination: string,
    format: TransferFormat,
    scope: Scope,
    doc: CatalogDocument,
  ): Promise<string[]> {
    if (format === "json") {
      await writeText(destination, encodeJsonDocument(doc));
      return [destination];
    }
    if (format === "markdown") {
      await writeText(destination, encodeMarkdownDocument(doc));
      return [destination];
    }

    if (scope === "resources") {
      await writeText(destination, encodeResourcesCsv(doc.resources ?? []));
      return [destination];
    }
    if (scope === "recipes") {
      await writeText(destination, encodeRecipesCsv(doc.recipes ?? []));
      return [destination];
    }

    const resourcesFile = join(destination, RESOURCES_CSV);
    const recipesFile = join(destination, RECIPES_CSV);
    await writeText(resourcesFile, encodeResourcesCsv(doc.resources ?? []));
    await writeText(recipesFile, encodeRecipesCsv(doc.recipes ?? []));
    return [resourcesFile, recipesFile];
  }

  /** Converts aborting errors into `Err`; anything else is a bug and propagates. */
  private async guard<T>(work: () => Promise<T>): Promise<Result<T, TransferError>> {
    try {
      return OkResult(await work());
    } catch (error) {
      if (error instanceof TransferError) {
        console.error(`[transfer] ${error.message}`, error.details);
        return ErrResult(error);
      }
      throw error;
    }
  }
}

function requireFormat(format: string): TransferFormat {
  const normalized = format.trim().toLowerCase();
  if (!isTransferFormat(normalized)) {
    throw new TransferError(
      "UNSUPPORTED_FORMAT",
      `Unsupported format "${format}" (expected json, markdown or csv)`,
    );
  }
  return normalized;
}

function orAbort<T>(listed: Result<T, Error>, what: string): T {
  if (listed.isErr()) {
    throw new TransferError("IO_ERROR", `Could not read ${what} from the catalog`, [
      listed.error.message,
    ]);
  }
  return listed.unwrap();
}
