import fs from "node:fs";
import path from "node:path";
import pino, { type DestinationStream, type Logger } from "pino";
import { ValidationError } from "@runnerctl/core/lib/errors";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace"];

// Fields that may carry a PAT or a registration token in a log call.
const REDACTED_PATHS = ["token", "password", "registrationToken", "*.token", "*.password", "*.registrationToken"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(raw: unknown, fallback: LogLevel): LogLevel {
  const normalized = String(raw ?? "")
    .trim()
    .toLowerCase();
  if (!normalized) return fallback;
  if (isLogLevel(normalized)) return normalized;
  throw new ValidationError(`invalid log level: ${normalized} (expected one of ${LOG_LEVELS.join(", ")})`);
}

export function resolveRunnerLogFile(params: { logsDir: string; runnerName: string }): string {
  const segment = params.runnerName.trim().replace(/[^A-Za-z0-9._-]+/g, "_").replace(/^_+|_+$/g, "");
  return path.join(params.logsDir, `${segment || "runner"}.jsonl`);
}

function openPrivateLogFile(filePath: string): string {
  const resolved = path.resolve(filePath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true, mode: 0o700 });
  fs.closeSync(fs.openSync(resolved, "a", 0o600));
  fs.chmodSync(resolved, 0o600);
  return resolved;
}

/**
 * JSON lines on stderr by default, since several commands print data on
 * stdout. `runner start` logs to stdout plus an owner-only file per runner.
 */
export function createLogger(params: {
  level: LogLevel;
  logToFile?: boolean;
  logFilePath?: string;
  destination?: 1 | 2 | DestinationStream;
}): Logger {
  const destination = params.destination ?? 2;
  const level = params.level;
  const streams: Array<{ stream: DestinationStream; level: LogLevel }> = [
    { stream: typeof destination === "number" ? pino.destination(destination) : destination, level },
  ];

  if (params.logToFile) {
    const logFilePath = String(params.logFilePath || "").trim();
    if (!logFilePath) throw new ValidationError("log file path required when file logging is enabled");
    streams.push({ stream: pino.destination({ dest: openPrivateLogFile(logFilePath), sync: false }), level });
  }

  return pino(
    {
      name: "runnerctl",
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
      redact: { paths: REDACTED_PATHS, censor: "<redacted>" },
    },
    pino.multistream(streams),
  );
}
