#!/usr/bin/env node
import { runSelfCheck } from "./harness";

const report = runSelfCheck();
process.exitCode = report.failed.length ? 1 : 0;
