import { z } from "zod";
import {
  DEFAULT_DISK_THRESHOLDS,
  DEFAULT_GITHUB_API_URL,
  DEFAULT_GITHUB_WEB_URL,
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_HANDSHAKE_PATTERN,
  DEFAULT_HEALTH_CONCURRENCY,
  DEFAULT_HEALTH_INTERVAL_MS,
  DEFAULT_HEALTH_TIMEOUT_MS,
  DEFAULT_LOAD_SOFT_PER_CORE,
  DEFAULT_MEMORY_THRESHOLDS,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_START_TIMEOUT_MS,
  DEFAULT_STOP_POLL_INTERVAL_MS,
  DEFAULT_WORK_DIRECTORY,
  RUNNERCTL_CONFIG_SCHEMA_VERSION,
} from "./defaults.js";

const TimeoutMsSchema = z.number().int().min(1).max(600_000);

const UrlSchema = z
  .string()
  .trim()
  .url()
  .transform((v) => v.replace(/\/+$/, ""));

const ThresholdSchema = z
  .object({
    softPercent: z.number().min(0).max(100),
    hardPercent: z.number().min(0).max(100),
  })
  .refine((t) => t.softPercent <= t.hardPercent, { message: "softPercent must not exceed hardPercent" });

export const GithubConfigSchema = z.object({
  apiUrl: UrlSchema.default(DEFAULT_GITHUB_API_URL),
  webUrl: UrlSchema.default(DEFAULT_GITHUB_WEB_URL),
  requestTimeoutMs: TimeoutMsSchema.default(DEFAULT_REQUEST_TIMEOUT_MS),
});

export const WorkerConfigSchema = z.object({
  // Empty means <home>/runners.
  runnersDir: z.string().trim().default(""),
  configureScript: z.string().trim().min(1).default("config.sh"),
  runScript: z.string().trim().min(1).default("run.sh"),
  handshakePattern: z
    .string()
    .min(1)
    .default(DEFAULT_HANDSHAKE_PATTERN)
    .refine(
      (v) => {
        try {
          new RegExp(v);
          return true;
        } catch {
          return false;
        }
      },
      { message: "handshakePattern must be a valid regular expression" },
    ),
  startTimeoutMs: TimeoutMsSchema.default(DEFAULT_START_TIMEOUT_MS),
  gracePeriodMs: TimeoutMsSchema.default(DEFAULT_GRACE_PERIOD_MS),
  pollIntervalMs: TimeoutMsSchema.default(DEFAULT_STOP_POLL_INTERVAL_MS),
  workDirectory: z.string().trim().min(1).default(DEFAULT_WORK_DIRECTORY),
  replace: z.boolean().default(true),
});

export const HealthConfigSchema = z.object({
  requestTimeoutMs: TimeoutMsSchema.default(DEFAULT_HEALTH_TIMEOUT_MS),
  intervalMs: z.number().int().min(1_000).default(DEFAULT_HEALTH_INTERVAL_MS),
  concurrency: z.number().int().min(1).max(32).default(DEFAULT_HEALTH_CONCURRENCY),
  disk: ThresholdSchema.default({ ...DEFAULT_DISK_THRESHOLDS }),
  memory: ThresholdSchema.default({ ...DEFAULT_MEMORY_THRESHOLDS }),
  load: z
    .object({
      softPerCore: z.number().positive().default(DEFAULT_LOAD_SOFT_PER_CORE),
    })
    .default({}),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
});

export const RunnerctlConfigSchema = z.object({
  schemaVersion: z.literal(RUNNERCTL_CONFIG_SCHEMA_VERSION).default(RUNNERCTL_CONFIG_SCHEMA_VERSION),
  github: GithubConfigSchema.default({}),
  worker: WorkerConfigSchema.default({}),
  health: HealthConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type RunnerctlConfig = z.infer<typeof RunnerctlConfigSchema>;
export type GithubConfig = z.infer<typeof GithubConfigSchema>;
export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;
export type HealthConfig = z.infer<typeof HealthConfigSchema>;

export function defaultRunnerctlConfig(): RunnerctlConfig {
  return RunnerctlConfigSchema.parse({});
}
