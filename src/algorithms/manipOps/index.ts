/**
 * Algorithms that change the elements of a sequence, or their order,
 * in place.
 */

export { replace } from "./replace";
export { reverse } from "./reverse";
export { partition } from "./partition";
