import type { Context } from "aws-lambda";
import { getConfig, type Config } from "./config";
import { ScriptFailedError } from "./errors";
import { invoke } from "./invocation";
import { createConsoleSink, type ConsoleLike } from "./sink/console";
import type { LogSink } from "./sink/types";

export type HandlerResult =
  | { status: "success"; durationMs: number }
  | { status: "failure"; exitCode: number; cause: string; durationMs: number };

export interface HandlerDeps {
  config?: () => Config;
  sink?: LogSink;
  logger?: ConsoleLike;
}

/**
 * Build the Lambda entry point. The trigger payload and context are opaque;
 * only the script's exit code decides the result.
 */
export function createHandler(deps: HandlerDeps = {}) {
  return async function handler(
    _event: unknown,
    _context?: Context,
  ): Promise<HandlerResult> {
    const config = (deps.config ?? getConfig)();
    const logger = deps.logger ?? console;

    const result = await invoke({
      executablePath: config.SCRIPT_PATH,
      shell: config.SCRIPT_SHELL,
      cwd: config.LAMBDA_TASK_ROOT,
      sink: deps.sink ?? createConsoleSink(logger),
    });

    const { outcome, durationMs } = result;
    if (outcome.status === "success") {
      logger.log(`Script succeeded in ${durationMs}ms`);
      return { status: "success", durationMs };
    }

    logger.log(`Script failed with exit code ${outcome.exitCode} in ${durationMs}ms`);
    if (config.RAISE_ON_FAILURE) {
      // Rejecting marks the invocation failed so async retries and the
      // on-failure destination take over
      throw new ScriptFailedError(outcome.exitCode, outcome.cause);
    }
    return { status: "failure", exitCode: outcome.exitCode, cause: outcome.cause, durationMs };
  };
}

export const handler = createHandler();
