import pino, { type Logger } from "pino";
import {
  DEFAULT_DISK_THRESHOLDS,
  DEFAULT_HEALTH_CONCURRENCY,
  DEFAULT_HEALTH_TIMEOUT_MS,
  DEFAULT_LOAD_SOFT_PER_CORE,
  DEFAULT_MEMORY_THRESHOLDS,
} from "../config/defaults.js";
import { sleep } from "../runtime/abort.js";
import { mapWithConcurrency } from "../runtime/concurrency.js";
import type { DispatchClient } from "../runners/dispatch-client.js";
import type { RunnerRegistry } from "../runners/registry.js";
import type { HealthFinding, HealthSnapshot, RunnerInstance } from "../runners/types.js";
import {
  aggregateVerdict,
  checkDisk,
  checkDispatchAuth,
  checkDispatchReachability,
  checkLoad,
  checkLogs,
  checkMemory,
  checkProcess,
  runCheck,
  type HostCheckContext,
  type Thresholds,
} from "./checks.js";
import { systemResourceProbe, type ResourceProbe } from "./resources.js";

export type HealthReport = { name: string; health: HealthSnapshot };

export type HealthMonitorOptions = {
  registry: RunnerRegistry;
  dispatch: DispatchClient;
  isProcessAlive: (instance: RunnerInstance) => boolean;
  tokenFor?: (repository: string) => Promise<string | null>;
  // Where the runner's `runner start` process writes its JSON log.
  logFileFor?: (instance: RunnerInstance) => string | null;
  dataDir: string;
  probe?: ResourceProbe;
  logger?: Logger;
  timeoutMs?: number;
  concurrency?: number;
  disk?: Thresholds;
  memory?: Thresholds;
  loadSoftPerCore?: number;
};

/**
 * Computes tri-state verdicts per instance and records them on the registry.
 * It never starts, stops or removes anything.
 */
export class HealthMonitor {
  private readonly registry: RunnerRegistry;
  private readonly dispatch: DispatchClient;
  private readonly isProcessAlive: (instance: RunnerInstance) => boolean;
  private readonly tokenFor: (repository: string) => Promise<string | null>;
  private readonly logFileFor: (instance: RunnerInstance) => string | null;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly host: HostCheckContext;

  constructor(opts: HealthMonitorOptions) {
    this.registry = opts.registry;
    this.dispatch = opts.dispatch;
    this.isProcessAlive = opts.isProcessAlive;
    this.tokenFor = opts.tokenFor ?? (async () => null);
    this.logFileFor = opts.logFileFor ?? (() => null);
    this.logger = opts.logger ?? pino({ level: "silent" });
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_HEALTH_TIMEOUT_MS;
    this.concurrency = opts.concurrency ?? DEFAULT_HEALTH_CONCURRENCY;
    this.host = {
      dispatch: opts.dispatch,
      probe: opts.probe ?? systemResourceProbe,
      dataDir: opts.dataDir,
      disk: opts.disk ?? { ...DEFAULT_DISK_THRESHOLDS },
      memory: opts.memory ?? { ...DEFAULT_MEMORY_THRESHOLDS },
      loadSoftPerCore: opts.loadSoftPerCore ?? DEFAULT_LOAD_SOFT_PER_CORE,
      timeoutMs: this.timeoutMs,
    };
  }

  async checkHost(): Promise<HealthFinding[]> {
    const t = this.timeoutMs;
    return await Promise.all([
      runCheck("dispatch-reachability", t, () => checkDispatchReachability(this.host), "error"),
      runCheck("disk", t, () => checkDisk(this.host)),
      runCheck("memory", t, () => checkMemory(this.host)),
      runCheck("load", t, () => checkLoad(this.host)),
    ]);
  }

  async checkInstance(name: string, hostFindings?: readonly HealthFinding[]): Promise<HealthSnapshot> {
    const instance = this.registry.require(name);
    const host = hostFindings ?? (await this.checkHost());
    const processAlive = this.isProcessAlive(instance);

    const findings: HealthFinding[] = [
      checkProcess({ instance, processAlive }),
      await runCheck("dispatch-auth", this.timeoutMs, async () => {
        const token = await this.tokenFor(instance.repository);
        return await checkDispatchAuth({ instance, processAlive, token, dispatch: this.dispatch, timeoutMs: this.timeoutMs });
      }),
      await runCheck("logs", this.timeoutMs, () => checkLogs({ logFile: this.logFileFor(instance) })),
      ...host,
    ];
    const health: HealthSnapshot = {
      verdict: aggregateVerdict(findings),
      findings,
      checkedAt: new Date().toISOString(),
    };
    await this.registry.annotateHealth(name, health);
    const level = health.verdict === "healthy" ? "debug" : "warn";
    this.logger[level]({ runner: name, verdict: health.verdict }, "health checked");
    return health;
  }

  async checkAll(): Promise<HealthReport[]> {
    const host = await this.checkHost();
    const names = this.registry.list().map((instance) => instance.name);
    return await mapWithConcurrency({
      items: names,
      concurrency: this.concurrency,
      fn: async (name) => ({ name, health: await this.checkInstance(name, host) }),
    });
  }

  /**
   * Re-runs checkAll every `intervalMs` until the signal aborts.
   */
  async watch(params: {
    intervalMs: number;
    signal: AbortSignal;
    onReport?: (reports: HealthReport[]) => void;
  }): Promise<void> {
    while (!params.signal.aborted) {
      const reports = await this.checkAll();
      params.onReport?.(reports);
      const waited = await sleep(params.intervalMs, params.signal);
      if (!waited) break;
    }
  }
}
