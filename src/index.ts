export * from "./cursors";
export * from "./algorithms";
export { runSelfCheck } from "./harness";

export type {
  SelfCheck,
  SelfCheckOptions,
  SelfCheckReport,
  SelfCheckFailure
} from "./harness";
