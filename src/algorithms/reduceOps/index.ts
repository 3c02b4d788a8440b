/**
 * Algorithms that visit every element, either to fold them into one
 * value or for the side-effects of a function.
 */

export { accumulate } from "./accumulate";
export { forEach } from "./forEach";
