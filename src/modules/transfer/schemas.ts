import { z } from "zod";
import type { IngredientRef, RecipeRecord, ResourceRecord } from "./types";

/**
 * Wire (snake_case) shapes shared by the JSON document and the CSV ingredient cell.
 * Unknown keys are stripped; absent keys stay absent.
 */

const NullableText = z.string().nullable().optional();

/** Older exports carry numeric ids; identifiers are strings here. */
const WireId = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .nullable()
  .optional();

const WireTimestamp = z.string().nullable().optional();

/** `true/false` or the `0/1` integers older exports wrote. `null` reads as `false`. */
export const WireDiscoveredSchema = z
  .union([z.boolean(), z.literal(0), z.literal(1), z.null()])
  .transform((value) => value === true || value === 1)
  .optional();

/** Accepts numbers and numeric strings; anything else becomes `undefined`. */
const LooseInteger = z.unknown().transform((value): number | undefined => {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  return undefined;
});

const WireInteger = z
  .union([z.number().int(), z.string().regex(/^-?\d+$/, "Expected an integer")])
  .transform((value) => Number(value));

const RecordName = z.string().trim().min(1, "name must not be empty");

export const WireIngredientSchema = z.object({
  resource_id: WireId,
  resource_name: z.string().nullable().optional(),
  /** Shape produced by hand-written files and the Markdown decoder. */
  name: z.string().optional(),
  quantity: LooseInteger,
});

export const WireResourceSchema = z.object({
  id: WireId,
  name: RecordName,
  category: NullableText,
  rarity: NullableText,
  description: NullableText,
  source_locations: NullableText,
  icon_path: NullableText,
  discovered: WireDiscoveredSchema,
  created_at: WireTimestamp,
  updated_at: WireTimestamp,
});

export const WireRecipeSchema = z.object({
  id: WireId,
  name: RecordName,
  description: NullableText,
  output_item_name: NullableText,
  output_quantity: WireInteger.optional(),
  crafting_time_seconds: WireInteger.nullable().optional(),
  required_station: NullableText,
  skill_requirement: NullableText,
  icon_path: NullableText,
  discovered: WireDiscoveredSchema,
  ingredients: z.array(z.unknown()).optional(),
  created_at: WireTimestamp,
  updated_at: WireTimestamp,
});

export type WireIngredient = z.input<typeof WireIngredientSchema>;
export type WireResource = z.input<typeof WireResourceSchema>;
export type WireRecipe = z.input<typeof WireRecipeSchema>;

/* ------------------------------ wire → record ------------------------------ */

export function ingredientFromWire(
  raw: unknown,
): { ok: true; ref: IngredientRef } | { ok: false; reason: string } {
  const parsed = WireIngredientSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map((issue) => issue.message).join("; ") };
  }
  const wire = parsed.data;
  return {
    ok: true,
    ref: {
      resourceId: wire.resource_id ?? undefined,
      resourceName: wire.resource_name ?? wire.name ?? undefined,
      quantity: wire.quantity,
    },
  };
}

export function resourceFromWire(wire: z.output<typeof WireResourceSchema>): ResourceRecord {
  return {
    id: wire.id ?? undefined,
    name: wire.name,
    category: wire.category,
    rarity: wire.rarity,
    description: wire.description,
    sourceLocations: wire.source_locations,
    iconPath: wire.icon_path,
    discovered: wire.discovered,
    createdAt: wire.created_at ?? undefined,
    updatedAt: wire.updated_at ?? undefined,
  };
}

/**
 * `ingredients` must already be converted by the caller, which also decides what
 * to do with unreadable entries.
 */
export function recipeFromWire(
  wire: z.output<typeof WireRecipeSchema>,
  ingredients: IngredientRef[] | undefined,
): RecipeRecord {
  return {
    id: wire.id ?? undefined,
    name: wire.name,
    description: wire.description,
    outputItemName: wire.output_item_name ?? undefined,
    outputQuantity: wire.output_quantity,
    craftingTimeSeconds: wire.crafting_time_seconds,
    requiredStation: wire.required_station,
    skillRequirement: wire.skill_requirement,
    iconPath: wire.icon_path,
    discovered: wire.discovered,
    ingredients,
    createdAt: wire.created_at ?? undefined,
    updatedAt: wire.updated_at ?? undefined,
  };
}

/* ------------------------------ record → wire ------------------------------ */

export function ingredientToWire(ref: IngredientRef): WireIngredient {
  return {
    resource_id: ref.resourceId,
    resource_name: ref.resourceName,
    quantity: ref.quantity,
  };
}

export function resourceToWire(record: ResourceRecord): WireResource {
  return {
    id: record.id,
    name: record.name,
    category: record.category,
    rarity: record.rarity,
    description: record.description,
    source_locations: record.sourceLocations,
    icon_path: record.iconPath,
    discovered: record.discovered,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}

export function recipeToWire(record: RecipeRecord): WireRecipe {
  return {
    id: record.id,
    name: record.name,
    description: record.description,
    output_item_name: record.outputItemName,
    output_quantity: record.outputQuantity,
    crafting_time_seconds: record.craftingTimeSeconds,
    required_station: record.requiredStation,
    skill_requirement: record.skillRequirement,
    icon_path: record.iconPath,
    discovered: record.discovered,
    ingredients: record.ingredients?.map(ingredientToWire),
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}
