/**
 * Navigation sources. Importing this module registers every dialect.
 */

export * as acceo from "./acceo";
export * as montreal from "./montreal";
