/**
 * @rungrad/core -- shared types, helpers and errors.
 */
export * from "./types.js";
export * from "./errors.js";
export * from "./broadcast.js";
export * from "./indexing.js";
export * from "./window.js";
export * from "./interfaces.js";
export { BackendRegistry, type BackendFactory } from "./registry.js";
export { SeededRng } from "./rng.js";
