export const RUNNERCTL_CONFIG_SCHEMA_VERSION = 1 as const;

export const DEFAULT_GITHUB_API_URL = "https://api.github.com";
export const DEFAULT_GITHUB_WEB_URL = "https://github.com";
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export const DEFAULT_HANDSHAKE_PATTERN = "Listening for Jobs|Connected to GitHub";
export const DEFAULT_START_TIMEOUT_MS = 60_000;
export const DEFAULT_GRACE_PERIOD_MS = 30_000;
export const DEFAULT_STOP_POLL_INTERVAL_MS = 1_000;
export const DEFAULT_WORK_DIRECTORY = "_work";
export const DEFAULT_RUNNER_LABELS = ["self-hosted"] as const;

export const DEFAULT_HEALTH_TIMEOUT_MS = 5_000;
export const DEFAULT_HEALTH_INTERVAL_MS = 60_000;
export const DEFAULT_HEALTH_CONCURRENCY = 4;
export const DEFAULT_DISK_THRESHOLDS = { softPercent: 80, hardPercent: 90 } as const;
export const DEFAULT_MEMORY_THRESHOLDS = { softPercent: 80, hardPercent: 95 } as const;
export const DEFAULT_LOAD_SOFT_PER_CORE = 2;
