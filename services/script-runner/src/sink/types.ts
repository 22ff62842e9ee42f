import type { LogRecord } from "../classification/types";

/** Append-only destination for classified records. Order must be preserved. */
export interface LogSink {
  write(records: readonly LogRecord[]): void;
}
