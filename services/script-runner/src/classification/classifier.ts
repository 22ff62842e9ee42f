import type { ProcessResult } from "../runner/types";
import type { ScriptInvocationError } from "../errors";
import {
  invocationFailedCause,
  neutralizeSentinel,
  scriptFailedCause,
  sentinelLine,
} from "./sentinel";
import type { Classification, LogRecord } from "./types";

/**
 * Turn a process result into log records and an outcome.
 *
 * Output lines are emitted as normal records in their original order. A
 * nonzero exit appends exactly one sentinel error record built from the exit
 * code alone, so the outcome never depends on what the script printed.
 */
export function classify(result: ProcessResult): Classification {
  const records: LogRecord[] = result.output.map((line) => ({
    severity: "normal" as const,
    text: neutralizeSentinel(line),
  }));

  if (result.exitCode === 0) {
    return { records, outcome: { status: "success" } };
  }

  const cause = scriptFailedCause(result.exitCode);
  records.push({ severity: "error", text: sentinelLine(cause) });

  return {
    records,
    outcome: { status: "failure", exitCode: result.exitCode, cause },
  };
}

/** Error record for a script that never started. */
export function classifyInvocationError(error: ScriptInvocationError): LogRecord {
  return { severity: "error", text: sentinelLine(invocationFailedCause(error.reason)) };
}
