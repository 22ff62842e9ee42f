import type { LogRecord } from "../classification/types";
import type { LogSink } from "./types";

export interface StoredLogRecord extends LogRecord {
  /** Epoch milliseconds at append time */
  readonly timestamp: number;
  readonly invocationId: string;
}

export interface MemoryLogStream {
  /** A sink that tags everything it writes with the given invocation */
  sinkFor(invocationId: string): LogSink;
  records(): readonly StoredLogRecord[];
  query(substring: string): StoredLogRecord[];
}

/**
 * In-process stand-in for a log group: append-only, timestamped and
 * searchable by substring.
 */
export function createMemoryLogStream(clock: () => number = Date.now): MemoryLogStream {
  const stored: StoredLogRecord[] = [];

  return {
    sinkFor(invocationId) {
      return {
        write(records) {
          for (const record of records) {
            stored.push(
              Object.freeze({ ...record, timestamp: clock(), invocationId }),
            );
          }
        },
      };
    },

    records() {
      return [...stored];
    },

    query(substring) {
      return stored.filter((r) => r.text.includes(substring));
    },
  };
}
