/**
 * JSON codec.
 *
 * Document: `{ metadata, resources, crafting_recipes }` with snake_case keys. A section
 * the document does not carry is omitted on encode and reported absent on decode.
 */

import { formatIssues } from "@/modules/catalog/validation";
import { CodecError } from "../errors";
import {
  WireRecipeSchema,
  WireResourceSchema,
  ingredientFromWire,
  recipeFromWire,
  recipeToWire,
  resourceFromWire,
  resourceToWire,
} from "../schemas";
import type {
  CatalogDocument,
  DecodeResult,
  IngredientRef,
  RecipeRecord,
  ResourceRecord,
} from "../types";

export const JSON_RECIPES_KEY = "crafting_recipes";

export function encodeJsonDocument(doc: CatalogDocument): string {
  const wire: Record<string, unknown> = {};
  if (doc.metadata) {
    wire.metadata = {
      export_date: doc.metadata.exportDate,
      app_version: doc.metadata.appVersion,
      total_resources: doc.metadata.totalResources,
      total_recipes: doc.metadata.totalRecipes,
    };
  }
  if (doc.resources) wire.resources = doc.resources.map(resourceToWire);
  if (doc.recipes) wire[JSON_RECIPES_KEY] = doc.recipes.map(recipeToWire);
  return `${JSON.stringify(wire, null, 2)}\n`;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sectionEntries(top: Record<string, unknown>, key: string): unknown[] | null {
  const section = top[key];
  if (section === undefined || section === null) return null;
  if (!Array.isArray(section)) throw new CodecError(`"${key}" must be an array`);
  return section;
}

function labelOf(entry: unknown, fallback: string): string {
  if (isPlainObject(entry) && typeof entry.name === "string" && entry.name.trim()) {
    return entry.name.trim();
  }
  return fallback;
}

/** Converts an ingredient list, dropping unreadable entries with a warning. */
export function readIngredientList(
  recipeName: string,
  raw: readonly unknown[],
  warnings: string[],
): IngredientRef[] {
  const refs: IngredientRef[] = [];
  raw.forEach((entry, index) => {
    const converted = ingredientFromWire(entry);
    if (converted.ok) {
      refs.push(converted.ref);
    } else {
      warnings.push(
        `Recipe "${recipeName}": ingredient #${index + 1} ignored (${converted.reason})`,
      );
    }
  });
  return refs;
}

export function decodeJsonDocument(text: string): DecodeResult {
  let top: unknown;
  try {
    top = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CodecError("Invalid JSON document", [detail]);
  }
  if (!isPlainObject(top)) throw new CodecError("JSON document must be an object");

  const resourceEntries = sectionEntries(top, "resources");
  const recipeEntries = sectionEntries(top, JSON_RECIPES_KEY);

  const resources: ResourceRecord[] = [];
  const recipes: RecipeRecord[] = [];
  const result: DecodeResult = {
    resources,
    recipes,
    rejected: [],
    warnings: [],
    sections: { resources: resourceEntries !== null, recipes: recipeEntries !== null },
  };

  resourceEntries?.forEach((entry, index) => {
    const parsed = WireResourceSchema.safeParse(entry);
    if (parsed.success) {
      resources.push(resourceFromWire(parsed.data));
    } else {
      result.rejected.push({
        kind: "resource",
        label: labelOf(entry, `resources[${index}]`),
        reason: formatIssues(parsed.error.issues),
      });
    }
  });

  recipeEntries?.forEach((entry, index) => {
    const parsed = WireRecipeSchema.safeParse(entry);
    if (!parsed.success) {
      result.rejected.push({
        kind: "recipe",
        label: labelOf(entry, `${JSON_RECIPES_KEY}[${index}]`),
        reason: formatIssues(parsed.error.issues),
      });
      return;
    }
    const ingredients = parsed.data.ingredients
      ? readIngredientList(parsed.data.name, parsed.data.ingredients, result.warnings)
      : undefined;
    recipes.push(recipeFromWire(parsed.data, ingredients));
  });

  return result;
}
