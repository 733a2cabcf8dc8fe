// Typed aliases for catalog identifiers to make intent explicit.
export type ResourceId = string;
export type RecipeId = string;
