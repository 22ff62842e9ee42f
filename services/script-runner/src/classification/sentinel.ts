/**
 * Wire contract shared with the log metric filter. Every line starting with
 * this prefix is counted as a failure, so it must never appear in a line that
 * was not produced by the classifier.
 */
export const SENTINEL_PREFIX = "ERROR|";

/** CloudWatch Logs filter pattern matching the sentinel as a literal term. */
export const METRIC_FILTER_PATTERN = `"${SENTINEL_PREFIX}"`;

const ESCAPED_PREFIX = "ERROR\\|";

export type InvocationFailureReason = "not_found" | "spawn_failed";

export function scriptFailedCause(exitCode: number): string {
  return `script_failed returncode=${exitCode}`;
}

export function invocationFailedCause(reason: InvocationFailureReason): string {
  return `script_invocation_failed reason=${reason}`;
}

/** `ERROR|<cause>`. The cause must be a fixed token, never script output. */
export function sentinelLine(cause: string): string {
  return `${SENTINEL_PREFIX}${cause}`;
}

/**
 * Rewrite any literal sentinel in script output so the line cannot be
 * mistaken for a classifier-produced failure record.
 */
export function neutralizeSentinel(line: string): string {
  if (!line.includes(SENTINEL_PREFIX)) return line;
  return line.split(SENTINEL_PREFIX).join(ESCAPED_PREFIX);
}
