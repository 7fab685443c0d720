import fs from "node:fs";
import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ValidationError } from "@runnerctl/core/lib/errors";
import { createLogger, parseLogLevel, resolveRunnerLogFile } from "../src/lib/logging/logger.js";

describe("cli logging", () => {
  it("parses log levels with fallback", () => {
    expect(parseLogLevel("", "info")).toBe("info");
    expect(parseLogLevel("DEBUG", "info")).toBe("debug");
    expect(parseLogLevel(undefined, "warn")).toBe("warn");
    expect(() => parseLogLevel("verbose", "info")).toThrow(ValidationError);
  });

  it("resolves the per-runner log file", () => {
    const logsDir = "/srv/runnerctl/logs";
    expect(resolveRunnerLogFile({ logsDir, runnerName: "build box" })).toBe(path.join(logsDir, "build_box.jsonl"));
    expect(resolveRunnerLogFile({ logsDir, runnerName: "a/../b" })).toBe(path.join(logsDir, "a_.._b.jsonl"));
    expect(resolveRunnerLogFile({ logsDir, runnerName: "///" })).toBe(path.join(logsDir, "runner.jsonl"));
  });

  it("redacts token fields", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "info", destination: { write: (msg: string) => void lines.push(msg) } });
    logger.info({ repository: "org/repo", token: "test-token", spec: { registrationToken: "reg-1" } }, "saved");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      name: "runnerctl",
      msg: "saved",
      repository: "org/repo",
      token: "<redacted>",
      spec: { registrationToken: "<redacted>" },
    });
  });

  it("creates an owner-only log file when file logging is on", async () => {
    // Left in place: the async file sink may still be opening it.
    const logDir = await mkdtemp(path.join(tmpdir(), "runnerctl-logs-"));
    const logFilePath = path.join(logDir, "logs", "runner-1.jsonl");
    const logger = createLogger({ level: "info", logToFile: true, logFilePath });
    logger.info({ ok: true }, "smoke");
    expect(fs.statSync(logFilePath).mode & 0o777).toBe(0o600);
    expect(fs.statSync(path.dirname(logFilePath)).mode & 0o777).toBe(0o700);
  });

  it("requires a path for file logging", () => {
    expect(() => createLogger({ level: "info", logToFile: true })).toThrow(/log file path required/);
  });
});
