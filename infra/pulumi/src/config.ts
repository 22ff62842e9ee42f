import { z } from "zod";

// Values accepted by CloudWatch Logs for retentionInDays
const RETENTION_DAYS: ReadonlySet<number> = new Set([
  1, 3, 5, 7, 14, 30, 60, 90, 120, 150, 180, 365, 400, 545, 731, 1096, 1827, 2192,
  2557, 2922, 3288, 3653,
]);

const monitorConfigSchema = z.object({
  notificationEmail: z.string().email(),
  namePrefix: z
    .string()
    .regex(/^[a-z][a-z0-9-]*$/, "namePrefix must be lowercase letters, digits and dashes")
    .max(40)
    .default("script-alarm"),
  alarmPeriodSeconds: z.coerce
    .number()
    .int()
    .refine(
      (p) => p === 10 || p === 30 || (p > 0 && p % 60 === 0),
      "alarmPeriodSeconds must be 10, 30 or a multiple of 60",
    )
    .default(60),
  alarmThreshold: z.coerce.number().int().min(1).default(1),
  logRetentionDays: z.coerce
    .number()
    .int()
    .refine((d) => RETENTION_DAYS.has(d), "logRetentionDays is not a CloudWatch retention value")
    .default(14),
  scheduleExpression: z
    .string()
    .regex(/^(rate|cron)\(.+\)$/, "scheduleExpression must be rate(...) or cron(...)")
    .optional(),
  maxRetryAttempts: z.coerce.number().int().min(0).max(2).default(2),
  codePath: z.string().min(1).default("../../services/script-runner/dist"),
  scriptPath: z.string().min(1).default("./script.sh"),
  raiseOnFailure: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
  timeoutSeconds: z.coerce.number().int().min(1).max(900).default(300),
  memorySize: z.coerce.number().int().min(128).max(10240).default(256),
});

export type MonitorConfig = z.infer<typeof monitorConfigSchema>;

const CONFIG_KEYS = Object.keys(monitorConfigSchema.shape);

export function loadMonitorConfig(values: Record<string, string | undefined>): MonitorConfig {
  return monitorConfigSchema.parse(values);
}

/** The part of `pulumi.Config` this module reads. */
export interface ConfigSource {
  get(key: string): string | undefined;
}

/** Read every known key from the stack config and validate it. */
export function readMonitorConfig(config: ConfigSource): MonitorConfig {
  return loadMonitorConfig(
    Object.fromEntries(CONFIG_KEYS.map((key) => [key, config.get(key)])),
  );
}
