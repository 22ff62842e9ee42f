import { spawn } from "node:child_process";
import { access, constants } from "node:fs/promises";
import { constants as osConstants } from "node:os";
import { resolve } from "node:path";
import { ScriptInvocationError } from "../errors";
import type { ProcessResult, RunOptions } from "./types";

const DEFAULT_SHELL = "bash";

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Split captured text into lines. CRLF endings are normalised and the empty
 * segment after a trailing newline is dropped.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text
    .split("\n")
    .map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function toExitCode({ code, signal }: ExitStatus): number {
  if (code !== null) return code;
  const signals: Partial<Record<string, number>> = { ...osConstants.signals };
  // Shell convention for a child killed by a signal
  return 128 + ((signal && signals[signal]) ?? 0);
}

/**
 * Run a script under `<shell> -e` and wait for it to exit.
 *
 * Never rejects for a nonzero exit; the caller decides what the exit code
 * means. Rejects with {@link ScriptInvocationError} when the script is not
 * readable or the interpreter cannot be spawned.
 */
export async function runScript(
  executablePath: string,
  options: RunOptions = {},
): Promise<ProcessResult> {
  const scriptPath = resolve(options.cwd ?? process.cwd(), executablePath);

  try {
    await access(scriptPath, constants.R_OK);
  } catch (err) {
    throw new ScriptInvocationError(executablePath, "not_found", { cause: err });
  }

  const started = performance.now();
  const chunks: Buffer[] = [];

  const status = await new Promise<ExitStatus>((resolveExit, reject) => {
    const child = spawn(options.shell ?? DEFAULT_SHELL, ["-e", scriptPath], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ["ignore", "pipe", "pipe"],
    });

    // Both streams land in one buffer so the merged order is arrival order
    child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));

    child.once("error", (err) => {
      reject(new ScriptInvocationError(executablePath, "spawn_failed", { cause: err }));
    });
    child.once("close", (code, signal) => resolveExit({ code, signal }));
  });

  return Object.freeze({
    exitCode: toExitCode(status),
    output: Object.freeze(splitLines(Buffer.concat(chunks).toString("utf8"))),
    durationMs: Math.round(performance.now() - started),
  });
}
