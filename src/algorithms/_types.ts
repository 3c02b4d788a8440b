/** Values the `<` and `>` operators order in a meaningful way. */
export type Comparable = number | bigint | string | Date;
