import { classify, classifyInvocationError } from "./classification/classifier";
import type { Outcome } from "./classification/types";
import { ScriptInvocationError } from "./errors";
import { runScript } from "./runner/run";
import type { ProcessResult } from "./runner/types";
import type { LogSink } from "./sink/types";

export interface InvokeOptions {
  executablePath: string;
  sink: LogSink;
  shell?: string;
  cwd?: string;
}

export interface InvocationResult {
  outcome: Outcome;
  recordCount: number;
  durationMs: number;
}

/**
 * Run the script once, classify it and write the records to the sink.
 *
 * A script that cannot be started still leaves a sentinel record behind
 * before the error is rethrown, so it is paged like any other failure.
 */
export async function invoke(options: InvokeOptions): Promise<InvocationResult> {
  let result: ProcessResult;
  try {
    result = await runScript(options.executablePath, {
      shell: options.shell,
      cwd: options.cwd,
    });
  } catch (err) {
    if (err instanceof ScriptInvocationError) {
      options.sink.write([classifyInvocationError(err)]);
    }
    throw err;
  }

  const { records, outcome } = classify(result);
  options.sink.write(records);

  return { outcome, recordCount: records.length, durationMs: result.durationMs };
}
