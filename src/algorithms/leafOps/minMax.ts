import type { Comparable } from "../_types";

/** Gets the larger of two values.  When they are equal, `y` is returned. */
export const max = <T extends Comparable>(x: T, y: T): T => x > y ? x : y;

/** Gets the smaller of two values.  When they are equal, `y` is returned. */
export const min = <T extends Comparable>(x: T, y: T): T => x < y ? x : y;
