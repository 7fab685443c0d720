import fs from "node:fs/promises";
import { z } from "zod";
import { RemoteApiError } from "../errors.js";
import { isMissingError } from "../storage/fs-safe.js";
import type { DispatchClient, RemoteRunner } from "../runners/dispatch-client.js";
import type { FindingSeverity, HealthFinding, HealthVerdict, RunnerInstance } from "../runners/types.js";
import type { ResourceProbe } from "./resources.js";

export type Thresholds = { softPercent: number; hardPercent: number };

export type InstanceCheckContext = {
  instance: RunnerInstance;
  processAlive: boolean;
  token: string | null;
  dispatch: DispatchClient;
  timeoutMs: number;
};

export type HostCheckContext = {
  dispatch: DispatchClient;
  probe: ResourceProbe;
  dataDir: string;
  disk: Thresholds;
  memory: Thresholds;
  loadSoftPerCore: number;
  timeoutMs: number;
};

export function aggregateVerdict(findings: readonly HealthFinding[]): HealthVerdict {
  if (findings.some((f) => f.severity === "error")) return "unhealthy";
  if (findings.some((f) => f.severity === "warning")) return "degraded";
  return "healthy";
}

export function classifyPercent(usedPercent: number, thresholds: Thresholds): FindingSeverity {
  if (usedPercent > thresholds.hardPercent) return "error";
  if (usedPercent > thresholds.softPercent) return "warning";
  return "info";
}

/**
 * Runs one check under its own deadline. A check that throws or times out
 * becomes a finding instead of failing the whole report.
 */
export async function runCheck(
  check: string,
  timeoutMs: number,
  fn: () => Promise<HealthFinding>,
  failureSeverity: FindingSeverity = "warning",
): Promise<HealthFinding> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<HealthFinding>((resolve) => {
    timer = setTimeout(
      () => resolve({ check, severity: failureSeverity, message: `check timed out after ${timeoutMs}ms` }),
      Math.max(1, timeoutMs),
    );
  });
  try {
    return await Promise.race([fn(), timeout]);
  } catch (err) {
    return { check, severity: failureSeverity, message: `check failed: ${err instanceof Error ? err.message : String(err)}` };
  } finally {
    clearTimeout(timer);
  }
}

export function checkProcess(ctx: Pick<InstanceCheckContext, "instance" | "processAlive">): HealthFinding {
  const { instance, processAlive } = ctx;
  const check = "process";
  if (instance.registrationState === "registered" && !processAlive) {
    return { check, severity: "error", message: "registered but no runner process is running" };
  }
  if (processAlive && instance.registrationState === "unregistered") {
    return { check, severity: "warning", message: "process running but registration missing" };
  }
  if (processAlive) {
    return { check, severity: "info", message: `running${instance.pid !== null ? ` (pid ${instance.pid})` : ""}` };
  }
  return { check, severity: "info", message: `not running (${instance.registrationState})` };
}

export async function checkDispatchAuth(ctx: InstanceCheckContext): Promise<HealthFinding> {
  const check = "dispatch-auth";
  const { instance } = ctx;
  if (!ctx.token) return { check, severity: "info", message: "skipped: no token available" };

  let runners: RemoteRunner[];
  try {
    runners = await ctx.dispatch.listRunners(instance.repository, ctx.token, { timeoutMs: ctx.timeoutMs });
  } catch (err) {
    if (err instanceof RemoteApiError) {
      if (err.category === "auth" || err.category === "forbidden") {
        return { check, severity: "warning", message: `token rejected by GitHub (http ${err.status ?? "?"})` };
      }
      return { check, severity: "warning", message: `runner list unavailable: ${err.message}` };
    }
    throw err;
  }

  const remote = runners.find((r) => (instance.remoteId !== null && r.id === instance.remoteId) || r.name === instance.name);
  if (!remote) {
    if (instance.registrationState === "registered") {
      return { check, severity: "warning", message: "registered locally but missing on GitHub" };
    }
    return { check, severity: "info", message: "not registered on GitHub" };
  }
  if (remote.status === "offline" && ctx.processAlive) {
    return { check, severity: "info", message: "GitHub reports the runner offline while the process is alive" };
  }
  return { check, severity: "info", message: `GitHub reports ${remote.status}${remote.busy ? " (busy)" : ""}` };
}

export async function checkDispatchReachability(ctx: Pick<HostCheckContext, "dispatch" | "timeoutMs">): Promise<HealthFinding> {
  const check = "dispatch-reachability";
  const result = await ctx.dispatch.checkReachability({ timeoutMs: ctx.timeoutMs });
  if (!result.ok) return { check, severity: "error", message: `GitHub API unreachable: ${result.detail}` };
  return { check, severity: "info", message: `GitHub API reachable (http ${result.status}, ${result.latencyMs}ms)` };
}

export async function checkDisk(ctx: Pick<HostCheckContext, "probe" | "dataDir" | "disk">): Promise<HealthFinding> {
  const sample = await ctx.probe.diskUsage(ctx.dataDir);
  return {
    check: "disk",
    severity: classifyPercent(sample.usedPercent, ctx.disk),
    message: `disk ${sample.usedPercent}% used (${sample.detail})`,
  };
}

export async function checkMemory(ctx: Pick<HostCheckContext, "probe" | "memory">): Promise<HealthFinding> {
  const sample = await ctx.probe.memoryUsage();
  return {
    check: "memory",
    severity: classifyPercent(sample.usedPercent, ctx.memory),
    message: `memory ${sample.usedPercent}% used (${sample.detail})`,
  };
}

export async function checkLoad(ctx: Pick<HostCheckContext, "probe" | "loadSoftPerCore">): Promise<HealthFinding> {
  const sample = await ctx.probe.loadPerCore();
  return {
    check: "load",
    severity: sample.perCore > ctx.loadSoftPerCore ? "warning" : "info",
    message: `load ${sample.perCore} per core over ${sample.cores} cores`,
  };
}

export const LOG_TAIL_LINES = 100;
const LOG_TAIL_BYTES = 64 * 1024;
// pino's numeric level for "error"; "fatal" is 60.
const LOG_LEVEL_ERROR = 50;

const LogLineSchema = z.object({ level: z.number(), msg: z.string().optional() });

async function readTail(filePath: string, maxBytes: number): Promise<string | null> {
  const handle = await fs.open(filePath, "r").catch((err: unknown) => {
    if (isMissingError(err)) return null;
    throw err;
  });
  if (!handle) return null;
  try {
    const { size } = await handle.stat();
    const start = Math.max(0, size - maxBytes);
    const buf = Buffer.alloc(size - start);
    await handle.read(buf, 0, buf.length, start);
    const text = buf.toString("utf8");
    // Drop the line the window cut in half.
    return start > 0 ? text.slice(text.indexOf("\n") + 1) : text;
  } finally {
    await handle.close();
  }
}

function parseLogLine(line: string): z.infer<typeof LogLineSchema> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  const result = LogLineSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * Scans the last lines of the runner's JSON log for error and fatal entries.
 */
export async function checkLogs(ctx: { logFile: string | null; tailLines?: number }): Promise<HealthFinding> {
  const check = "logs";
  if (!ctx.logFile) return { check, severity: "info", message: "skipped: no log file" };
  const text = await readTail(ctx.logFile, LOG_TAIL_BYTES);
  if (text === null) return { check, severity: "info", message: "no log file yet" };

  const lines = text
    .split("\n")
    .filter((line) => line.trim())
    .slice(-(ctx.tailLines ?? LOG_TAIL_LINES));
  let errors = 0;
  let latest: string | null = null;
  for (const line of lines) {
    const entry = parseLogLine(line);
    if (!entry || entry.level < LOG_LEVEL_ERROR) continue;
    errors += 1;
    latest = entry.msg ?? null;
  }
  if (errors === 0) return { check, severity: "info", message: `no errors in the last ${lines.length} log lines` };
  return {
    check,
    severity: "warning",
    message: `${errors} error line${errors === 1 ? "" : "s"} in the last ${lines.length} log lines${latest ? `; latest: ${latest}` : ""}`,
  };
}
