export * from "./codecs";
export * from "./errors";
export * from "./reconcile";
export * from "./resolver";
export * from "./service";
export * from "./types";
