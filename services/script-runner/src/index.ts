export { handler, createHandler } from "./handler";
export type { HandlerResult, HandlerDeps } from "./handler";
export { invoke } from "./invocation";
export type { InvocationResult, InvokeOptions } from "./invocation";
export { runScript } from "./runner/run";
export type { ProcessResult, RunOptions } from "./runner/types";
export { classify, classifyInvocationError } from "./classification/classifier";
export type { Classification, LogRecord, Outcome, Severity } from "./classification/types";
export { SENTINEL_PREFIX, METRIC_FILTER_PATTERN } from "./classification/sentinel";
export { ScriptFailedError, ScriptInvocationError } from "./errors";
export { createConsoleSink } from "./sink/console";
export { createMemoryLogStream } from "./sink/memory";
export type { LogSink } from "./sink/types";
