import pino, { type Logger } from "pino";
import {
  DEFAULT_GITHUB_WEB_URL,
  DEFAULT_GRACE_PERIOD_MS,
  DEFAULT_HANDSHAKE_PATTERN,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_START_TIMEOUT_MS,
  DEFAULT_STOP_POLL_INTERVAL_MS,
  DEFAULT_WORK_DIRECTORY,
} from "../config/defaults.js";
import {
  InvalidStateError,
  RemoteApiError,
  RunnerctlError,
  StartTimeoutError,
  StopTimeoutError,
  WorkerProcessError,
} from "../errors.js";
import { createAbortError, sleep, throwIfAborted } from "../runtime/abort.js";
import { KeyedMutex } from "../runtime/concurrency.js";
import { redactKnownSecretsText } from "../runtime/redaction.js";
import type { DispatchClient, RemoteRunner } from "./dispatch-client.js";
import type { RunnerRegistry } from "./registry.js";
import type { RunnerInstance } from "./types.js";
import type { WorkerHandle, WorkerRuntime } from "./worker-process.js";

export const REMOTE_CLEANUP_WARNING = "remote cleanup did not complete";
export const LOCAL_CLEANUP_WARNING = "local runner configuration was not removed";
const REGISTRATION_AMBIGUOUS_WARNING = "registration may exist on GitHub; run `runnerctl runner reconcile`";
const DEFAULT_KILL_CONFIRM_MS = 5_000;
const STDERR_TAIL_LINES = 20;

export type LifecycleControllerOptions = {
  registry: RunnerRegistry;
  dispatch: DispatchClient;
  runtime: WorkerRuntime;
  resolveRunnerDir: (name: string) => string;
  logger?: Logger;
  webUrl?: string;
  handshakePattern?: string | RegExp;
  startTimeoutMs?: number;
  gracePeriodMs?: number;
  pollIntervalMs?: number;
  requestTimeoutMs?: number;
  workDirectory?: string;
  replace?: boolean;
  retryDelayMs?: number;
  // How long a SIGKILLed process may linger before StopTimeoutError.
  killConfirmMs?: number;
};

export type StopOptions = {
  graceful?: boolean;
  gracePeriodMs?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
};

// Resolves the API token for a repository; null when none is available.
export type TokenSource = (repository: string) => Promise<string | null>;

export type ReconcileEntry = { name: string; actions: string[] };

export type ShutdownReport = {
  stopped: string[];
  removed: string[];
  failures: Array<{ name: string; error: unknown }>;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function withoutWarning(warnings: readonly string[], warning: string): string[] {
  return warnings.filter((w) => w !== warning);
}

/**
 * Drives runner instances through register, start, stop and remove.
 *
 * Operations on one name are serialized; different names proceed in parallel.
 * Live process handles stay in this object; the registry only gets their pid.
 */
export class LifecycleController {
  private readonly registry: RunnerRegistry;
  private readonly dispatch: DispatchClient;
  private readonly runtime: WorkerRuntime;
  private readonly resolveRunnerDir: (name: string) => string;
  private readonly logger: Logger;
  private readonly webUrl: string;
  private readonly handshake: RegExp;
  private readonly startTimeoutMs: number;
  private readonly gracePeriodMs: number;
  private readonly pollIntervalMs: number;
  private readonly requestTimeoutMs: number;
  private readonly workDirectory: string;
  private readonly replace: boolean;
  private readonly retryDelayMs: number;
  private readonly killConfirmMs: number;
  private readonly locks = new KeyedMutex();
  private readonly handles = new Map<string, WorkerHandle>();

  constructor(opts: LifecycleControllerOptions) {
    this.registry = opts.registry;
    this.dispatch = opts.dispatch;
    this.runtime = opts.runtime;
    this.resolveRunnerDir = opts.resolveRunnerDir;
    this.logger = opts.logger ?? pino({ level: "silent" });
    this.webUrl = (opts.webUrl ?? DEFAULT_GITHUB_WEB_URL).replace(/\/+$/, "");
    const pattern = opts.handshakePattern ?? DEFAULT_HANDSHAKE_PATTERN;
    this.handshake = typeof pattern === "string" ? new RegExp(pattern) : pattern;
    this.startTimeoutMs = opts.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS;
    this.gracePeriodMs = opts.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_STOP_POLL_INTERVAL_MS;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.workDirectory = opts.workDirectory ?? DEFAULT_WORK_DIRECTORY;
    this.replace = opts.replace ?? true;
    this.retryDelayMs = opts.retryDelayMs ?? 1_000;
    this.killConfirmMs = opts.killConfirmMs ?? DEFAULT_KILL_CONFIRM_MS;
  }

  isRunning(name: string): boolean {
    return this.handles.get(name)?.isAlive() ?? false;
  }

  runningNames(): string[] {
    return Array.from(this.handles.entries())
      .filter(([, handle]) => handle.isAlive())
      .map(([name]) => name)
      .sort((a, b) => a.localeCompare(b));
  }

  /**
   * Resolves with the exit status once the process attached to `name` exits,
   * or with `null` right away when nothing is attached.
   */
  async waitForExit(name: string): Promise<{ exitCode: number | null; signal: NodeJS.Signals | null } | null> {
    const handle = this.handles.get(name);
    if (!handle?.isAlive()) return null;
    return await new Promise((resolve) => {
      handle.onExit((exitCode, signal) => resolve({ exitCode, signal }));
    });
  }

  async register(name: string, token: string, opts: { signal?: AbortSignal } = {}): Promise<RunnerInstance> {
    return await this.locks.runExclusive(name, async () => {
      const instance = this.registry.require(name);
      const log = this.logger.child({ runner: name });
      if (instance.registrationState === "registered") {
        log.debug("already registered");
        return instance;
      }
      if (instance.registrationState !== "unregistered") {
        throw new InvalidStateError(
          name,
          `runner ${name} is ${instance.registrationState}`,
          "run `runnerctl runner reconcile` to settle the interrupted operation",
        );
      }
      throwIfAborted(opts.signal, `register ${name}`);

      await this.registry.transition(name, "registering", {
        warnings: withoutWarning(instance.warnings, REGISTRATION_AMBIGUOUS_WARNING),
      });
      let configureStarted = false;
      try {
        const registration = await this.withTransientRetry(name, () =>
          this.dispatch.createRegistrationToken(instance.repository, token, { timeoutMs: this.requestTimeoutMs }),
        );
        throwIfAborted(opts.signal, `register ${name}`);

        configureStarted = true;
        await this.runtime.configure({
          name,
          runnerDir: this.resolveRunnerDir(name),
          repositoryUrl: `${this.webUrl}/${instance.repository}`,
          registrationToken: registration.token,
          labels: instance.labels,
          workDirectory: this.workDirectory,
          ephemeral: instance.ephemeral,
          replace: this.replace,
          signal: opts.signal,
        });

        const remoteId = await this.lookupRemoteId(instance, token, log);
        const registered = await this.registry.transition(name, "registered", { remoteId });
        log.info({ remoteId }, "runner registered");
        return registered;
      } catch (err) {
        const ambiguous = configureStarted || (err instanceof RunnerctlError && err.remoteAmbiguous);
        if (err instanceof RunnerctlError && ambiguous) err.remoteAmbiguous = true;
        await this.registry.transition(name, "unregistered", { remoteId: null });
        if (ambiguous) await this.registry.addWarning(name, REGISTRATION_AMBIGUOUS_WARNING);
        log.warn({ err: errorMessage(err), remoteAmbiguous: ambiguous }, "registration failed; rolled back");
        throw err;
      }
    });
  }

  async start(name: string, opts: { signal?: AbortSignal; timeoutMs?: number } = {}): Promise<RunnerInstance> {
    return await this.locks.runExclusive(name, async () => {
      const instance = this.registry.require(name);
      const log = this.logger.child({ runner: name });
      if (instance.registrationState !== "registered") {
        throw new InvalidStateError(name, `runner ${name} is ${instance.registrationState}`, `run: runnerctl runner register ${name}`);
      }
      if (this.liveHandle(name, instance)) {
        log.debug("already running");
        return this.registry.require(name);
      }
      throwIfAborted(opts.signal, `start ${name}`);

      const handle = await this.runtime.launch({ name, runnerDir: this.resolveRunnerDir(name) });
      this.handles.set(name, handle);
      const stderrTail: string[] = [];
      handle.onLine((line, stream) => {
        if (stream === "stderr") {
          stderrTail.push(line);
          if (stderrTail.length > STDERR_TAIL_LINES) stderrTail.shift();
        }
        log.debug({ stream }, redactKnownSecretsText(line));
      });
      await this.registry.update(name, { pid: handle.pid, startedAt: new Date().toISOString() });

      try {
        await this.waitForHandshake(name, handle, opts.timeoutMs ?? this.startTimeoutMs, stderrTail, opts.signal);
      } catch (err) {
        log.warn({ err: errorMessage(err) }, "runner failed to start");
        // The caller's signal may already be aborted; the grace period still applies.
        const exited = await this.terminate(name, handle, { graceful: true }, log).then(
          () => true,
          (killErr: unknown) => {
            log.error({ err: errorMessage(killErr), pid: handle.pid }, "failed runner did not exit");
            return false;
          },
        );
        if (exited) {
          this.handles.delete(name);
          await this.registry.update(name, { pid: null, startedAt: null });
        }
        throw err;
      }

      handle.onExit((exitCode, signal) => {
        if (this.handles.get(name) !== handle) return;
        this.handles.delete(name);
        log.warn({ exitCode, signal }, "runner process exited");
        void this.registry.update(name, { pid: null, startedAt: null }).catch((err: unknown) => {
          log.error({ err: errorMessage(err) }, "failed to record runner exit");
        });
      });
      log.info({ pid: handle.pid }, "runner listening for jobs");
      return this.registry.require(name);
    });
  }

  async stop(name: string, opts: StopOptions = {}): Promise<RunnerInstance> {
    return await this.locks.runExclusive(name, async () => {
      const instance = this.registry.require(name);
      const log = this.logger.child({ runner: name });
      const handle = this.liveHandle(name, instance);
      if (!handle) {
        log.debug("not running");
        return this.registry.require(name);
      }

      await this.terminate(name, handle, opts, log);
      this.handles.delete(name);
      log.info("runner stopped");
      return await this.registry.update(name, { pid: null, startedAt: null });
    });
  }

  async remove(name: string, token: string, opts: { force?: boolean; signal?: AbortSignal } = {}): Promise<RunnerInstance> {
    return await this.locks.runExclusive(name, async () => {
      const instance = this.registry.require(name);
      const log = this.logger.child({ runner: name });
      if (instance.registrationState === "unregistered") {
        log.debug("already unregistered");
        return instance;
      }
      if (instance.registrationState === "registering") {
        throw new InvalidStateError(name, `runner ${name} is registering`, "run `runnerctl runner reconcile` first");
      }
      if (this.liveHandle(name, instance)) {
        throw new InvalidStateError(name, `runner ${name} is still running`, `run: runnerctl runner stop ${name}`);
      }
      throwIfAborted(opts.signal, `remove ${name}`);

      // A stale "removing" left by a crash is retried from where it stopped.
      if (instance.registrationState === "registered") await this.registry.transition(name, "removing");

      let existed: boolean;
      try {
        existed = await this.deleteRemote(instance, token);
      } catch (err) {
        if (opts.force) {
          log.warn({ err: errorMessage(err) }, "remote removal failed; forcing local removal");
          const localWarning = await this.forgetLocal(name, log);
          const current = this.registry.require(name);
          const warnings = [...withoutWarning(current.warnings, REMOTE_CLEANUP_WARNING), REMOTE_CLEANUP_WARNING];
          if (localWarning) warnings.push(localWarning);
          return await this.registry.transition(name, "unregistered", { remoteId: null, warnings });
        }
        await this.registry.transition(name, "registered");
        await this.registry.addWarning(name, `remote removal failed: ${errorMessage(err)}`);
        log.warn({ err: errorMessage(err) }, "remote removal failed; runner left registered");
        throw err;
      }

      const localWarning = await this.forgetLocal(name, log);
      const warnings = withoutWarning(instance.warnings, REMOTE_CLEANUP_WARNING);
      if (localWarning) warnings.push(localWarning);
      const removed = await this.registry.transition(name, "unregistered", { remoteId: null, warnings });
      log.info({ existed }, existed ? "runner removed from GitHub" : "runner was already gone on GitHub");
      return removed;
    });
  }

  /**
   * Aligns the registry with live processes and, given a token, with the
   * runner list on GitHub. GitHub wins wherever the two disagree.
   */
  async reconcile(tokens?: string | TokenSource, opts: { signal?: AbortSignal } = {}): Promise<ReconcileEntry[]> {
    const tokenFor: TokenSource | null = typeof tokens === "function" ? tokens : tokens ? async () => tokens : null;
    const remoteByRepository = new Map<string, Promise<RemoteRunner[] | null>>();
    const remoteRunners = (repository: string): Promise<RemoteRunner[] | null> => {
      let pending = remoteByRepository.get(repository);
      if (!pending) {
        pending = tokenFor ? this.listRemoteRunners(repository, tokenFor) : Promise.resolve(null);
        remoteByRepository.set(repository, pending);
      }
      return pending;
    };

    const report: ReconcileEntry[] = [];
    for (const snapshot of this.registry.list()) {
      throwIfAborted(opts.signal, "reconcile");
      const actions = await this.locks.runExclusive(snapshot.name, async () => {
        return await this.reconcileOne(snapshot.name, remoteRunners);
      });
      report.push({ name: snapshot.name, actions });
    }
    return report;
  }

  /**
   * Stops every process this controller holds. With `includeRecorded`, also
   * those started by other invocations, found through the pid in the registry.
   */
  async shutdown(
    opts: {
      remove?: boolean;
      token?: string | TokenSource;
      graceful?: boolean;
      gracePeriodMs?: number;
      includeRecorded?: boolean;
    } = {},
  ): Promise<ShutdownReport> {
    const report: ShutdownReport = { stopped: [], removed: [], failures: [] };
    if (opts.includeRecorded) {
      for (const instance of this.registry.list()) {
        if (instance.pid !== null) this.liveHandle(instance.name, instance);
      }
    }
    const running = this.runningNames();
    const results = await Promise.allSettled(
      running.map((name) => this.stop(name, { graceful: opts.graceful ?? true, gracePeriodMs: opts.gracePeriodMs })),
    );
    results.forEach((result, idx) => {
      const name = running[idx] ?? "";
      if (result.status === "fulfilled") report.stopped.push(name);
      else report.failures.push({ name, error: result.reason });
    });

    const tokens = opts.token;
    if (!tokens) return report;
    const tokenFor: TokenSource = typeof tokens === "function" ? tokens : async () => tokens;
    const candidates = this.registry
      .list()
      .filter((instance) => report.stopped.includes(instance.name))
      .filter((instance) => instance.registrationState === "registered" && (opts.remove || instance.ephemeral));
    for (const instance of candidates) {
      try {
        const token = await tokenFor(instance.repository);
        if (!token) {
          this.logger.warn({ runner: instance.name }, "no token for removal; runner left registered");
          continue;
        }
        await this.remove(instance.name, token);
        report.removed.push(instance.name);
      } catch (err) {
        report.failures.push({ name: instance.name, error: err });
      }
    }
    if (report.failures.length > 0) {
      this.logger.warn({ failures: report.failures.map((f) => f.name) }, "shutdown finished with failures");
    }
    return report;
  }

  /**
   * SIGTERM, then SIGKILL once the grace period runs out or `opts.signal`
   * aborts. Throws StopTimeoutError when the process outlives SIGKILL.
   */
  private async terminate(name: string, handle: WorkerHandle, opts: StopOptions, log: Logger): Promise<void> {
    const graceful = opts.graceful ?? true;
    const gracePeriodMs = opts.gracePeriodMs ?? this.gracePeriodMs;
    const pollIntervalMs = Math.max(1, opts.pollIntervalMs ?? this.pollIntervalMs);
    if (!handle.isAlive()) return;
    if (graceful) {
      handle.kill("SIGTERM");
      const deadline = Date.now() + gracePeriodMs;
      while (handle.isAlive() && Date.now() < deadline) {
        const waited = await sleep(Math.min(pollIntervalMs, deadline - Date.now()), opts.signal);
        if (!waited) {
          log.warn({ pid: handle.pid }, "stop aborted during grace period; escalating to SIGKILL");
          break;
        }
      }
    }

    if (handle.isAlive()) {
      if (graceful) {
        log.warn({ pid: handle.pid, gracePeriodMs }, "runner ignored SIGTERM for the whole grace period; sending SIGKILL");
      }
      handle.kill("SIGKILL");
      const killDeadline = Date.now() + this.killConfirmMs;
      while (handle.isAlive() && Date.now() < killDeadline) {
        await sleep(Math.min(pollIntervalMs, 50));
      }
      if (handle.isAlive()) throw new StopTimeoutError(name, handle.pid);
    }
  }

  // Returns a warning instead of throwing: by now GitHub no longer knows the runner.
  private async forgetLocal(name: string, log: Logger): Promise<string | null> {
    try {
      await this.runtime.forgetLocalConfig(this.resolveRunnerDir(name));
      return null;
    } catch (err) {
      log.warn({ err: errorMessage(err) }, "could not remove local runner configuration");
      return `${LOCAL_CLEANUP_WARNING}: ${errorMessage(err)}`;
    }
  }

  private liveHandle(name: string, instance: RunnerInstance): WorkerHandle | null {
    const existing = this.handles.get(name);
    if (existing?.isAlive()) return existing;
    if (existing) this.handles.delete(name);
    if (instance.pid === null) return null;
    const attached = this.runtime.attach(instance.pid);
    if (!attached) return null;
    this.handles.set(name, attached);
    return attached;
  }

  private async reconcileOne(
    name: string,
    remoteRunners: (repository: string) => Promise<RemoteRunner[] | null>,
  ): Promise<string[]> {
    const actions: string[] = [];
    let instance = this.registry.require(name);
    const log = this.logger.child({ runner: name });

    if (!this.handles.get(name)?.isAlive() && instance.pid !== null) {
      const pid = instance.pid;
      if (this.liveHandle(name, instance)) {
        actions.push(`re-attached running process ${pid}`);
      } else {
        instance = await this.registry.update(name, { pid: null, startedAt: null });
        actions.push(`cleared stale pid ${pid}`);
      }
    }
    const alive = this.isRunning(name);

    let runners: RemoteRunner[] | null;
    try {
      runners = await remoteRunners(instance.repository);
    } catch (err) {
      actions.push(`remote check skipped: ${errorMessage(err)}`);
      return actions;
    }
    if (!runners) {
      if (instance.registrationState === "registering" || instance.registrationState === "removing") {
        actions.push(`left ${instance.registrationState}; a token is needed to check GitHub`);
      }
      return actions;
    }
    const remoteId = instance.remoteId;
    const remote = runners.find((r) => (remoteId !== null && r.id === remoteId) || r.name === name);

    switch (instance.registrationState) {
      case "registering":
        if (remote) {
          await this.registry.transition(name, "registered", {
            remoteId: remote.id,
            warnings: withoutWarning(instance.warnings, REGISTRATION_AMBIGUOUS_WARNING),
          });
          actions.push("interrupted registration completed on GitHub; marked registered");
        } else {
          await this.registry.transition(name, "unregistered", { remoteId: null });
          actions.push("interrupted registration not found on GitHub; rolled back");
        }
        break;
      case "removing":
        if (remote) {
          await this.registry.transition(name, "registered", { remoteId: remote.id });
          await this.registry.addWarning(name, REMOTE_CLEANUP_WARNING);
          actions.push("interrupted removal: runner still on GitHub; marked registered");
        } else {
          const localWarning = await this.forgetLocal(name, log);
          await this.registry.transition(name, "unregistered", { remoteId: null });
          if (localWarning) await this.registry.addWarning(name, localWarning);
          actions.push("interrupted removal completed; marked unregistered");
        }
        break;
      case "registered":
        if (!remote) {
          await this.registry.transition(name, "unregistered", { remoteId: null });
          await this.registry.addWarning(name, "registration disappeared from GitHub; register again");
          actions.push("registration missing on GitHub; marked unregistered");
          if (alive) actions.push("process is still running without a registration");
        } else if (remote.id !== instance.remoteId) {
          await this.registry.update(name, { remoteId: remote.id });
          actions.push(`recorded remote id ${remote.id}`);
        }
        break;
      case "unregistered":
        if (remote) {
          await this.registry.transition(name, "registered", {
            remoteId: remote.id,
            warnings: withoutWarning(instance.warnings, REGISTRATION_AMBIGUOUS_WARNING),
          });
          actions.push(`adopted existing GitHub runner ${remote.id}`);
        }
        break;
    }
    if (actions.length > 0) log.info({ actions }, "reconciled");
    return actions;
  }

  private async listRemoteRunners(repository: string, tokenFor: TokenSource): Promise<RemoteRunner[] | null> {
    const token = await tokenFor(repository);
    if (!token) return null;
    return await this.dispatch.listRunners(repository, token, { timeoutMs: this.requestTimeoutMs });
  }

  private async lookupRemoteId(instance: RunnerInstance, token: string, log: Logger): Promise<number | null> {
    try {
      const runners = await this.dispatch.listRunners(instance.repository, token, { timeoutMs: this.requestTimeoutMs });
      return runners.find((r) => r.name === instance.name)?.id ?? null;
    } catch (err) {
      log.warn({ err: errorMessage(err) }, "registered, but could not look up the remote runner id");
      return null;
    }
  }

  /**
   * Deletes by the recorded id, then by name: config.sh --replace can give the
   * runner a new id that this registry never saw.
   */
  private async deleteRemote(instance: RunnerInstance, token: string): Promise<boolean> {
    const timeoutMs = this.requestTimeoutMs;
    if (instance.remoteId !== null && (await this.dispatch.deleteRunner(instance.repository, token, instance.remoteId, { timeoutMs }))) {
      return true;
    }
    const runners = await this.dispatch.listRunners(instance.repository, token, { timeoutMs });
    const byName = runners.find((r) => r.name === instance.name);
    if (!byName || byName.id === instance.remoteId) return false;
    return await this.dispatch.deleteRunner(instance.repository, token, byName.id, { timeoutMs });
  }

  private async withTransientRetry<T>(name: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof RemoteApiError) || !err.retryable) throw err;
      this.logger.warn({ runner: name, err: err.message }, "transient GitHub failure; retrying once");
      await sleep(this.retryDelayMs);
      return await fn();
    }
  }

  private waitForHandshake(
    name: string,
    handle: WorkerHandle,
    timeoutMs: number,
    stderrTail: readonly string[],
    signal?: AbortSignal,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const cleanups: Array<() => void> = [];
      const settle = (err?: Error) => {
        if (settled) return;
        settled = true;
        for (const cleanup of cleanups) cleanup();
        if (err) reject(err);
        else resolve();
      };

      cleanups.push(
        handle.onLine((line) => {
          if (this.handshake.test(line)) settle();
        }),
      );
      cleanups.push(
        handle.onExit((exitCode, exitSignal) => {
          settle(
            new WorkerProcessError({
              subject: name,
              message: `runner ${name} exited before listening for jobs (${exitCode ?? exitSignal ?? "unknown status"})`,
              exitCode,
              stderrTail: redactKnownSecretsText(stderrTail.join("\n")),
            }),
          );
        }),
      );
      const timer = setTimeout(() => settle(new StartTimeoutError(name, timeoutMs)), Math.max(1, timeoutMs));
      cleanups.push(() => clearTimeout(timer));
      if (signal) {
        const onAbort = () => settle(createAbortError(`start ${name} aborted`));
        if (signal.aborted) onAbort();
        signal.addEventListener("abort", onAbort, { once: true });
        cleanups.push(() => signal.removeEventListener("abort", onAbort));
      }
    });
  }
}
