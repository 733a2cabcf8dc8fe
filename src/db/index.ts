/**
 * Fachada de la capa de persistencia: cliente Mongo, schemas y el backend del catálogo.
 */

export * from "./mongo";
export * from "./schemas/catalog";
export * from "./repositories/catalog";
