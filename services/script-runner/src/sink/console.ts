import type { LogSink } from "./types";

export type ConsoleLike = Pick<Console, "log" | "error">;

/**
 * Lambda forwards stdout and stderr to the function's log group, so the
 * console is the log sink in production.
 */
export function createConsoleSink(out: ConsoleLike = console): LogSink {
  return {
    write(records) {
      for (const record of records) {
        if (record.severity === "error") {
          out.error(record.text);
        } else {
          out.log(record.text);
        }
      }
    },
  };
}
