export * from "./general";
export * from "./path";
export * from "./errors";
export * from "./logger";
