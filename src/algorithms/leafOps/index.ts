/**
 * Small operations on single values and positions that the other
 * algorithms build on.
 */

export { swap } from "./swap";
export { max, min } from "./minMax";
