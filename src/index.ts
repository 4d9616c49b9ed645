/**
 * Barrel exports.
 *
 * Re-exports the scoring pipeline and its collaborators for library-style use.
 * The CLI and server import the modules directly.
 */
export * from "./config";
export * from "./mib";
export * from "./model-service";
export * from "./predict";
export * from "./rx";
export * from "./scoring";
export * from "./store";
export * from "./types";
