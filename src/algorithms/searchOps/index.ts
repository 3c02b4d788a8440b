/**
 * Algorithms that locate elements or sub-sequences without changing
 * anything.
 */

export { equal } from "./equal";
export { find } from "./find";
export { rfind } from "./rfind";
export { findIf } from "./findIf";
export { search } from "./search";
export { binarySearch } from "./binarySearch";
