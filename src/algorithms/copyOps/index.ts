/**
 * Algorithms that copy elements into another sequence, or compact a
 * sequence in place, optionally leaving some elements out.
 */

export { copy } from "./copy";
export { removeCopy } from "./removeCopy";
export { removeCopyIf } from "./removeCopyIf";
export { remove } from "./remove";
export { removeIf } from "./removeIf";
