/**
 * Barrel exports.
 *
 * Re-exports the engine and its parts for library-style use. The CLI and
 * server import modules directly.
 */
export * from "./batch";
export * from "./blender";
export * from "./config";
export * from "./engine";
export * from "./errors";
export * from "./explain";
export * from "./input";
export * from "./model";
export * from "./normalizer";
export * from "./policy";
export * from "./scoring";
export * from "./types";
