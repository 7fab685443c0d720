import path from "node:path";
import process from "node:process";
import type { Logger } from "pino";
import { coerceTrimmedString } from "@runnerctl/shared/lib/strings";
import { loadRunnerctlConfig } from "@runnerctl/core/lib/config/io";
import type { RunnerctlConfig } from "@runnerctl/core/lib/config/schema";
import { HealthMonitor } from "@runnerctl/core/lib/health/monitor";
import { GithubDispatchClient, type DispatchClient } from "@runnerctl/core/lib/runners/dispatch-client";
import { LifecycleController } from "@runnerctl/core/lib/runners/lifecycle";
import { RunnerRegistry } from "@runnerctl/core/lib/runners/registry";
import type { RunnerInstance } from "@runnerctl/core/lib/runners/types";
import { LocalWorkerRuntime, isPidAlive, type WorkerRuntime } from "@runnerctl/core/lib/runners/worker-process";
import { CredentialStore } from "@runnerctl/core/lib/vault/credential-store";
import { getRunnerDir, getRuntimeLayout, resolveHomeDir, type RuntimeLayout } from "@runnerctl/core/runtime-layout";
import { createLogger, parseLogLevel, resolveRunnerLogFile } from "./logging/logger.js";
import { userAgent } from "./version.js";

export type BaseContext = {
  layout: RuntimeLayout;
  config: RunnerctlConfig;
  configExists: boolean;
  logger: Logger;
};

export type RunnerContext = BaseContext & {
  registry: RunnerRegistry;
  dispatch: DispatchClient;
  runtime: WorkerRuntime;
  controller: LifecycleController;
};

export async function loadBaseContext(params: {
  home?: unknown;
  logLevel?: unknown;
  // Set by long-running commands: log to stdout and to a per-runner .jsonl file.
  agent?: { runnerName: string; logFile?: string; noLogFile?: boolean };
}): Promise<BaseContext> {
  const homeArg = coerceTrimmedString(params.home);
  const layout = getRuntimeLayout(homeArg ? path.resolve(homeArg) : resolveHomeDir());
  const { config, exists } = await loadRunnerctlConfig(layout.configPath);
  const level = parseLogLevel(coerceTrimmedString(params.logLevel) || process.env["RUNNERCTL_LOG_LEVEL"], config.logging.level);
  const agent = params.agent;
  const logToFile = Boolean(agent && !agent.noLogFile);
  const logger = createLogger({
    level,
    destination: agent ? 1 : 2,
    logToFile,
    logFilePath:
      agent && logToFile
        ? coerceTrimmedString(agent.logFile) || resolveRunnerLogFile({ logsDir: layout.logsDir, runnerName: agent.runnerName })
        : undefined,
  });
  return { layout, config, configExists: exists, logger };
}

export function createCredentialStore(ctx: BaseContext): CredentialStore {
  return new CredentialStore({
    paths: {
      vaultDir: ctx.layout.vaultDir,
      recordsPath: ctx.layout.vaultRecordsPath,
      verifierPath: ctx.layout.vaultVerifierPath,
    },
    logger: ctx.logger.child({ component: "vault" }),
  });
}

export async function openRunnerContext(ctx: BaseContext): Promise<RunnerContext> {
  const { config, layout, logger } = ctx;
  const registry = await RunnerRegistry.open({ filePath: layout.registryPath, logger: logger.child({ component: "registry" }) });
  const dispatch = new GithubDispatchClient({
    apiUrl: config.github.apiUrl,
    timeoutMs: config.github.requestTimeoutMs,
    userAgent: userAgent(),
  });
  const runtime = new LocalWorkerRuntime({
    configureScript: config.worker.configureScript,
    runScript: config.worker.runScript,
  });
  const controller = new LifecycleController({
    registry,
    dispatch,
    runtime,
    resolveRunnerDir: (name) => getRunnerDir(layout, config.worker.runnersDir, name),
    logger: logger.child({ component: "lifecycle" }),
    webUrl: config.github.webUrl,
    handshakePattern: config.worker.handshakePattern,
    startTimeoutMs: config.worker.startTimeoutMs,
    gracePeriodMs: config.worker.gracePeriodMs,
    pollIntervalMs: config.worker.pollIntervalMs,
    requestTimeoutMs: config.github.requestTimeoutMs,
    workDirectory: config.worker.workDirectory,
    replace: config.worker.replace,
  });
  return { ...ctx, registry, dispatch, runtime, controller };
}

export function createHealthMonitor(
  ctx: RunnerContext,
  tokenFor?: (repository: string) => Promise<string | null>,
): HealthMonitor {
  const { config } = ctx;
  return new HealthMonitor({
    registry: ctx.registry,
    dispatch: ctx.dispatch,
    isProcessAlive: (instance: RunnerInstance) =>
      ctx.controller.isRunning(instance.name) || (instance.pid !== null && isPidAlive(instance.pid)),
    tokenFor,
    logFileFor: (instance: RunnerInstance) => resolveRunnerLogFile({ logsDir: ctx.layout.logsDir, runnerName: instance.name }),
    dataDir: ctx.layout.homeDir,
    logger: ctx.logger.child({ component: "health" }),
    timeoutMs: config.health.requestTimeoutMs,
    concurrency: config.health.concurrency,
    disk: config.health.disk,
    memory: config.health.memory,
    loadSoftPerCore: config.health.load.softPerCore,
  });
}
