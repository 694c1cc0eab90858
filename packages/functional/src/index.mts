/**
 * @arrowlet/functional - Composable function wrappers and applicative containers
 */

// re-export everything for full access
export * from "./arrow.mjs";
export * from "./curry.mjs";
export * from "./either.mjs";
export * from "./errors.mjs";
export * from "./fun.mjs";
export * from "./identity.mjs";
export * from "./list.mjs";
export * from "./maybe.mjs";
export * from "./multi-value.mjs";
export * from "./partial.mjs";
export * from "./trace.mjs";
