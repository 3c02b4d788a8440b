import { Subject } from "rxjs";
import { performance } from "node:perf_hooks";
import config from "../config";
import { noop } from "./functions";

import type { PerformanceMeasure } from "node:perf_hooks";
import type { UndefOr } from "./utility-types";

interface LoggerMessage {
  origin: string;
  type: "info" | "warn" | "error" | "dir";
  data: unknown[];
}

/** A small interface for working with performance measurements. */
export interface StopWatch {
  /** Begins measuring performance. */
  start(): void;
  /** Stops measuring performance. */
  stop(logMeasurement?: boolean): void;
  /** Stops measuring performance and returns the measurement. */
  stopAndReport(): UndefOr<PerformanceMeasure>;
}

const omegaLogger = new Subject<LoggerMessage>();

omegaLogger.subscribe(({ origin, type, data }) => {
  switch (type) {
    case "info": return console.info(`[${origin}]`, ...data);
    case "warn": return console.warn(`[${origin}]`, ...data);
    case "error": return console.error(`[${origin}]`, ...data);
    case "dir": {
      if (data.length === 0) return;
      console.log(`[${origin}]:`);
      return console.dir(data[0]);
    }
  }
});

export interface ILogger {
  info(...data: unknown[]): void;
  warn(...data: unknown[]): void;
  error(...data: unknown[]): void;
  dir(item: unknown): void;
  mark(name: string): void;

  /**
   * Creates a stop watch to track the performance of some operation.
   * Use `start` to begin tracking time and `stop` to end the measurement.
   */
  stopWatch(
    /** The name of this measurement. */
    name: string
  ): StopWatch;

  /**
   * Calls `task`, logging how long it took.  The time is logged even
   * when `task` throws.
   */
  measure<T>(name: string, task: () => T): T;
}

class Logger implements ILogger {
  #origin: string;
  #stream: Subject<LoggerMessage>;

  constructor(origin: string) {
    this.#origin = origin;
    this.#stream = new Subject();
    this.#stream.subscribe(omegaLogger);
  }

  info = (...data: unknown[]) =>
    this.#stream.next({ origin: this.#origin, type: "info", data });
  warn = (...data: unknown[]) =>
    this.#stream.next({ origin: this.#origin, type: "warn", data });
  error = (...data: unknown[]) =>
    this.#stream.next({ origin: this.#origin, type: "error", data });
  dir = (item: unknown) =>
    this.#stream.next({ origin: this.#origin, type: "dir", data: [item] });
  mark = (name: string) => {
    performance.mark(`[${this.#origin}] ${name}`);
  };

  stopWatch(name: string): StopWatch {
    const NAME = `[${this.#origin}] ${name}`;
    const START = `[${this.#origin}] START ${name}`;
    const STOP = `[${this.#origin}] STOP ${name}`;
    let started = false;

    const start = () => {
      if (!started) {
        started = true;
        performance.mark(START);
        return;
      }
      this.warn(`Measurement \`${name}\` already started.`);
    };

    const stopAndReport = (): UndefOr<PerformanceMeasure> => {
      if (started) {
        started = false;
        performance.mark(STOP);
        return performance.measure(NAME, START, STOP);
      }
      this.warn(`Measurement \`${name}\` not yet started.`);
      return undefined;
    };

    const stop = (logMeasurement: boolean = true) => {
      const measurement = stopAndReport();
      if (!measurement || !logMeasurement) return;
      this.info(`${name} took ${measurement.duration.toFixed(2)}ms.`);
    };

    return { start, stop, stopAndReport };
  }

  measure<T>(name: string, task: () => T): T {
    const stopWatch = this.stopWatch(name);
    stopWatch.start();
    try {
      return task();
    }
    finally {
      stopWatch.stop();
    }
  }
}

class NullLogger implements ILogger {
  info = noop;
  warn = noop;
  error = noop;
  dir = noop;
  mark = noop;

  stopWatch(): StopWatch {
    return {
      start: noop,
      stop: noop,
      stopAndReport: () => undefined
    };
  }

  measure<T>(_name: string, task: () => T): T {
    return task();
  }
}

export const createLogger = (origin: string): ILogger => {
  // Can be disabled via config.
  if (!config.debugLogging) return new NullLogger();
  // Jest reports console output from every test; keep it quiet.
  if (config.inTestEnv) return new NullLogger();
  return new Logger(origin);
};
