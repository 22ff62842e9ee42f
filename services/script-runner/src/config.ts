import { z } from "zod";

const configSchema = z.object({
  SCRIPT_PATH: z.string().min(1).default("./script.sh"),
  SCRIPT_SHELL: z.string().min(1).default("bash"),
  RAISE_ON_FAILURE: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
  // Set by the Lambda runtime; SCRIPT_PATH is resolved against it
  LAMBDA_TASK_ROOT: z.string().optional(),
});

export type Config = z.infer<typeof configSchema>;

let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = configSchema.parse(process.env);
  }
  return config;
}

export function loadConfig(env: Record<string, string | undefined>): Config {
  return configSchema.parse(env);
}
