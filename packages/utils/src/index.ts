export { logger, LogLevel } from "./logger";
export type { Logger, LogRecord, LogSink } from "./logger";
export { createIntervalWorker } from "./worker";
export type { IntervalWorker, WorkerOptions } from "./worker";
export { BoundedQueue } from "./bounded-queue";
