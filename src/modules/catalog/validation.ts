import { z } from "zod";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import {
  CatalogError,
  type IngredientInput,
  type RecipeFields,
  type ResourceFields,
} from "./types";

const NullableText = z.string().nullable();

const ResourceFieldsSchema = z
  .object({
    category: NullableText,
    rarity: NullableText,
    description: NullableText,
    sourceLocations: NullableText,
    iconPath: NullableText,
    discovered: z.boolean(),
  })
  .partial();

const RecipeFieldsSchema = z
  .object({
    description: NullableText,
    outputItemName: z.string().trim().min(1, "outputItemName must not be empty"),
    outputQuantity: z.number().int().min(1, "outputQuantity must be at least 1"),
    craftingTimeSeconds: z
      .number()
      .int()
      .min(0, "craftingTimeSeconds must not be negative")
      .nullable(),
    requiredStation: NullableText,
    skillRequirement: NullableText,
    iconPath: NullableText,
    discovered: z.boolean(),
  })
  .partial();

const IngredientInputSchema = z.object({
  resourceId: z.string().min(1),
  quantity: z.number().int().positive("ingredient quantity must be positive"),
});

/** Joins Zod issues as `path: message; ...`. */
export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) =>
      issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}

function invalid(entity: string, detail: string): CatalogError {
  return new CatalogError("INVALID_RECORD", `Invalid ${entity}: ${detail}`);
}

/** Trims a name and rejects empty ones. */
export function normalizeName(
  raw: string,
  entity: "resource" | "recipe",
): Result<string, CatalogError> {
  const name = raw.trim();
  if (!name) return ErrResult(invalid(entity, "name must not be empty"));
  return OkResult(name);
}

export function checkResourceFields(
  fields: Partial<ResourceFields>,
): CatalogError | null {
  const parsed = ResourceFieldsSchema.safeParse(fields);
  return parsed.success ? null : invalid("resource", formatIssues(parsed.error.issues));
}

export function checkRecipeFields(fields: Partial<RecipeFields>): CatalogError | null {
  const parsed = RecipeFieldsSchema.safeParse(fields);
  return parsed.success ? null : invalid("recipe", formatIssues(parsed.error.issues));
}

/**
 * Checks quantities and duplicate references. Existence of the referenced
 * resources is checked by each backend at commit time.
 */
export function checkIngredients(
  ingredients: readonly IngredientInput[],
): CatalogError | null {
  const seen = new Set<string>();
  for (const [index, ingredient] of ingredients.entries()) {
    const parsed = IngredientInputSchema.safeParse(ingredient);
    if (!parsed.success) {
      return invalid(
        "recipe",
        `ingredients[${index}] ${formatIssues(parsed.error.issues)}`,
      );
    }
    if (seen.has(ingredient.resourceId)) {
      return invalid(
        "recipe",
        `ingredients[${index}] duplicates resource '${ingredient.resourceId}'`,
      );
    }
    seen.add(ingredient.resourceId);
  }
  return null;
}

/** Copies the listed keys whose value is not `undefined`. */
export function pickDefined<T extends object, K extends keyof T>(
  source: T,
  keys: readonly K[],
): Partial<Pick<T, K>> {
  const out: Partial<Pick<T, K>> = {};
  for (const key of keys) {
    const value = source[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export function missingReference(ids: readonly string[]): CatalogError {
  return new CatalogError(
    "MISSING_REFERENCE",
    `Ingredient references unknown resource(s): ${ids.join(", ")}`,
  );
}

export function duplicateName(entity: "resource" | "recipe", name: string): CatalogError {
  return new CatalogError(
    "DUPLICATE_NAME",
    `A ${entity} named '${name}' already exists`,
  );
}
