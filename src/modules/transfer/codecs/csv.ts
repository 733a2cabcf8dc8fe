/**
 * CSV codec: one file per entity kind.
 *
 * Cells are text, so the codec owns the typing rules:
 * - empty text cell → `null`, missing column → absent;
 * - empty numeric cell → absent, non-numeric → row rejected;
 * - `ingredients` is a JSON array in a single cell; a malformed cell reads as `[]`
 *   with a warning.
 */

import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { CodecError } from "../errors";
import { ingredientToWire } from "../schemas";
import type {
  DecodeResult,
  EntityKind,
  IngredientRef,
  RecipeRecord,
  RejectedRecord,
  ResourceRecord,
} from "../types";
import { readIngredientList } from "./json";

export const RESOURCES_CSV = "resources.csv";
export const RECIPES_CSV = "crafting_recipes.csv";

export const RESOURCE_COLUMNS = [
  "id",
  "name",
  "category",
  "rarity",
  "description",
  "source_locations",
  "icon_path",
  "discovered",
  "created_at",
  "updated_at",
] as const;

export const RECIPE_COLUMNS = [
  "id",
  "name",
  "description",
  "output_item_name",
  "output_quantity",
  "crafting_time_seconds",
  "required_station",
  "skill_requirement",
  "icon_path",
  "discovered",
  "ingredients",
  "created_at",
  "updated_at",
] as const;

type ResourceColumn = (typeof RESOURCE_COLUMNS)[number];
type RecipeColumn = (typeof RECIPE_COLUMNS)[number];

/* -------------------------------- encoding -------------------------------- */

function cell(value: string | number | boolean | null | undefined): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "boolean") return value ? "1" : "0";
  return String(value);
}

function encodeIngredients(refs: readonly IngredientRef[] | undefined): string {
  if (!refs) return "";
  return JSON.stringify(refs.map(ingredientToWire));
}

function writeTable<C extends string>(
  columns: readonly C[],
  rows: readonly Record<C, string>[],
): string {
  return stringify(
    [columns, ...rows.map((row) => columns.map((column) => row[column]))],
    { record_delimiter: "\n" },
  );
}

export function encodeResourcesCsv(records: readonly ResourceRecord[]): string {
  const rows = records.map(
    (record): Record<ResourceColumn, string> => ({
      id: cell(record.id),
      name: record.name,
      category: cell(record.category),
      rarity: cell(record.rarity),
      description: cell(record.description),
      source_locations: cell(record.sourceLocations),
      icon_path: cell(record.iconPath),
      discovered: cell(record.discovered),
      created_at: cell(record.createdAt),
      updated_at: cell(record.updatedAt),
    }),
  );
  return writeTable(RESOURCE_COLUMNS, rows);
}

export function encodeRecipesCsv(records: readonly RecipeRecord[]): string {
  const rows = records.map(
    (record): Record<RecipeColumn, string> => ({
      id: cell(record.id),
      name: record.name,
      description: cell(record.description),
      output_item_name: cell(record.outputItemName),
      output_quantity: cell(record.outputQuantity),
      crafting_time_seconds: cell(record.craftingTimeSeconds),
      required_station: cell(record.requiredStation),
      skill_requirement: cell(record.skillRequirement),
      icon_path: cell(record.iconPath),
      discovered: cell(record.discovered),
      ingredients: encodeIngredients(record.ingredients),
      created_at: cell(record.createdAt),
      updated_at: cell(record.updatedAt),
    }),
  );
  return writeTable(RECIPE_COLUMNS, rows);
}

/* -------------------------------- decoding -------------------------------- */

const TableSchema = z.array(z.array(z.string()));

/** A data row keyed by header; columns the file lacks are absent. */
type Row = Map<string, string>;

class RowError extends Error {}

function readTable(text: string, file: string): Row[] {
  let raw: unknown;
  try {
    raw = parse(text, { bom: true, skip_empty_lines: true, relax_column_count: true });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CodecError(`Invalid CSV in ${file}`, [detail]);
  }

  const table = TableSchema.parse(raw);
  const [header, ...body] = table;
  const columns = (header ?? []).map((name) => name.trim().toLowerCase());
  if (!columns.includes("name")) {
    throw new CodecError(`${file} has no "name" column`);
  }

  return body.map((values) => {
    const row: Row = new Map();
    columns.forEach((column, index) => row.set(column, values[index] ?? ""));
    return row;
  });
}

function textCell(row: Row, column: string): string | null | undefined {
  const value = row.get(column);
  if (value === undefined) return undefined;
  return value.trim() ? value : null;
}

function optionalCell(row: Row, column: string): string | undefined {
  const value = row.get(column)?.trim();
  return value ? value : undefined;
}

function integerCell(row: Row, column: string): number | undefined {
  const value = row.get(column)?.trim();
  if (!value) return undefined;
  if (!/^-?\d+$/.test(value)) throw new RowError(`${column}: "${value}" is not an integer`);
  return Number(value);
}

function discoveredCell(row: Row): boolean | undefined {
  const value = row.get("discovered")?.trim().toLowerCase();
  if (!value) return undefined;
  if (["1", "true", "yes"].includes(value)) return true;
  if (["0", "false", "no"].includes(value)) return false;
  throw new RowError(`discovered: "${value}" is not a boolean`);
}

function ingredientsCell(
  row: Row,
  recipeName: string,
  warnings: string[],
): IngredientRef[] | undefined {
  const value = row.get("ingredients");
  if (value === undefined) return undefined;
  if (!value.trim()) return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    warnings.push(`Recipe "${recipeName}": ingredients cell is not valid JSON; read as empty`);
    return [];
  }
  if (!Array.isArray(parsed)) {
    warnings.push(`Recipe "${recipeName}": ingredients cell is not a JSON array; read as empty`);
    return [];
  }
  return readIngredientList(recipeName, parsed, warnings);
}

interface TableDecode<T> {
  readonly records: T[];
  readonly rejected: RejectedRecord[];
  readonly warnings: string[];
}

function decodeRows<T>(
  rows: readonly Row[],
  kind: EntityKind,
  file: string,
  build: (row: Row, name: string, warnings: string[]) => T,
): TableDecode<T> {
  const out: TableDecode<T> = { records: [], rejected: [], warnings: [] };
  rows.forEach((row, index) => {
    // header is line 1
    const fallbackLabel = `${file} line ${index + 2}`;
    const name = row.get("name")?.trim() ?? "";
    if (!name) {
      out.rejected.push({ kind, label: fallbackLabel, reason: "name must not be empty" });
      return;
    }
    try {
      out.records.push(build(row, name, out.warnings));
    } catch (error) {
      if (!(error instanceof RowError)) throw error;
      out.rejected.push({ kind, label: name, reason: error.message });
    }
  });
  return out;
}

export function decodeResourcesCsv(text: string): TableDecode<ResourceRecord> {
  return decodeRows(readTable(text, RESOURCES_CSV), "resource", RESOURCES_CSV, (row, name) => ({
    id: optionalCell(row, "id"),
    name,
    category: textCell(row, "category"),
    rarity: textCell(row, "rarity"),
    description: textCell(row, "description"),
    sourceLocations: textCell(row, "source_locations"),
    iconPath: textCell(row, "icon_path"),
    discovered: discoveredCell(row),
    createdAt: optionalCell(row, "created_at"),
    updatedAt: optionalCell(row, "updated_at"),
  }));
}

export function decodeRecipesCsv(text: string): TableDecode<RecipeRecord> {
  return decodeRows(
    readTable(text, RECIPES_CSV),
    "recipe",
    RECIPES_CSV,
    (row, name, warnings) => ({
      id: optionalCell(row, "id"),
      name,
      description: textCell(row, "description"),
      outputItemName: optionalCell(row, "output_item_name"),
      outputQuantity: integerCell(row, "output_quantity"),
      craftingTimeSeconds: integerCell(row, "crafting_time_seconds"),
      requiredStation: textCell(row, "required_station"),
      skillRequirement: textCell(row, "skill_requirement"),
      iconPath: textCell(row, "icon_path"),
      discovered: discoveredCell(row),
      ingredients: ingredientsCell(row, name, warnings),
      createdAt: optionalCell(row, "created_at"),
      updatedAt: optionalCell(row, "updated_at"),
    }),
  );
}

/** File contents keyed by kind; an absent key means the file was not part of the source. */
export interface CsvBundle {
  readonly resources?: string;
  readonly recipes?: string;
}

export function decodeCsvBundle(bundle: CsvBundle): DecodeResult {
  if (bundle.resources === undefined && bundle.recipes === undefined) {
    throw new CodecError(`CSV source contains neither ${RESOURCES_CSV} nor ${RECIPES_CSV}`);
  }

  const resources =
    bundle.resources !== undefined ? decodeResourcesCsv(bundle.resources) : null;
  const recipes = bundle.recipes !== undefined ? decodeRecipesCsv(bundle.recipes) : null;

  return {
    resources: resources?.records ?? [],
    recipes: recipes?.records ?? [],
    rejected: [...(resources?.rejected ?? []), ...(recipes?.rejected ?? [])],
    warnings: [...(resources?.warnings ?? []), ...(recipes?.warnings ?? [])],
    sections: { resources: resources !== null, recipes: recipes !== null },
  };
}
