/**
 * The algorithms.  Each one works on a `[begin, end)` range of cursors
 * and asks only for the kind of cursor it actually needs.
 */

export type { Comparable } from "./_types";
export * from "./searchOps";
export * from "./copyOps";
export * from "./manipOps";
export * from "./reduceOps";
export * from "./leafOps";
