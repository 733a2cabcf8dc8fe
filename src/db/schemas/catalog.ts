/**
 * Zod schemas for the catalog collections.
 * Purpose: define document shape/defaults and validate repo reads.
 */
import { z } from "zod";

export const RESOURCES_COLLECTION = "resources";
export const RECIPES_COLLECTION = "crafting_recipes";

export const ResourceDocSchema = z.object({
  _id: z.string(),
  name: z.string(),
  category: z.string().nullable().default(null),
  rarity: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
  sourceLocations: z.string().nullable().default(null),
  iconPath: z.string().nullable().default(null),
  discovered: z.boolean().default(false),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export const IngredientDocSchema = z.object({
  resourceId: z.string(),
  quantity: z.number().int().positive(),
});

export const RecipeDocSchema = z.object({
  _id: z.string(),
  name: z.string(),
  description: z.string().nullable().default(null),
  outputItemName: z.string(),
  outputQuantity: z.number().int().min(1).default(1),
  craftingTimeSeconds: z.number().int().nullable().default(null),
  requiredStation: z.string().nullable().default(null),
  skillRequirement: z.string().nullable().default(null),
  iconPath: z.string().nullable().default(null),
  discovered: z.boolean().default(false),
  ingredients: z.array(IngredientDocSchema).default([]),
  createdAt: z.date(),
  updatedAt: z.date(),
});

export type ResourceDoc = z.infer<typeof ResourceDocSchema>;
export type IngredientDoc = z.infer<typeof IngredientDocSchema>;
export type RecipeDoc = z.infer<typeof RecipeDocSchema>;
