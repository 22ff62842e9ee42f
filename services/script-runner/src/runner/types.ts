export interface ProcessResult {
  readonly exitCode: number;
  /** Merged stdout and stderr, one entry per line, in arrival order */
  readonly output: readonly string[];
  readonly durationMs: number;
}

export interface RunOptions {
  /** Interpreter used to run the script with `-e` (default: bash) */
  shell?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}
