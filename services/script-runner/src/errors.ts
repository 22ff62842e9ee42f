import type { InvocationFailureReason } from "./classification/sentinel";

/** The script could not be started at all. */
export class ScriptInvocationError extends Error {
  override readonly name = "ScriptInvocationError";

  constructor(
    readonly scriptPath: string,
    readonly reason: InvocationFailureReason,
    options?: { cause?: unknown },
  ) {
    super(`Could not start script ${scriptPath} (${reason})`, options);
  }
}

/** The script ran and exited nonzero. Thrown at the Lambda boundary so async retries engage. */
export class ScriptFailedError extends Error {
  override readonly name = "ScriptFailedError";

  constructor(
    readonly exitCode: number,
    readonly failureCause: string,
  ) {
    super(`Script failed with exit code ${exitCode}: ${failureCause}`);
  }
}
