export * from "./memory";
export * from "./repository";
export * from "./types";
export * from "./validation";
