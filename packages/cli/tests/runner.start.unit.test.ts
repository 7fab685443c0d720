import pino from "pino";
import { describe, expect, it } from "vitest";
import type { DispatchClient, RemoteRunner } from "@runnerctl/core/lib/runners/dispatch-client";
import { LifecycleController } from "@runnerctl/core/lib/runners/lifecycle";
import { RunnerRegistry } from "@runnerctl/core/lib/runners/registry";
import type { ExitListener, LineListener, WorkerHandle, WorkerRuntime } from "@runnerctl/core/lib/runners/worker-process";
import { superviseRunner } from "../src/commands/runner/start.js";

class StubHandle implements WorkerHandle {
  readonly pid = 4242;
  readonly signals: NodeJS.Signals[] = [];
  private alive = true;
  private readonly exitListeners = new Set<ExitListener>();

  isAlive(): boolean {
    return this.alive;
  }

  onLine(listener: LineListener): () => void {
    setTimeout(() => listener("Listening for Jobs", "stdout"), 0);
    return () => undefined;
  }

  onExit(listener: ExitListener): () => void {
    this.exitListeners.add(listener);
    return () => this.exitListeners.delete(listener);
  }

  kill(signal: NodeJS.Signals): boolean {
    this.signals.push(signal);
    setTimeout(() => this.exit(null, signal), 0);
    return true;
  }

  exit(exitCode: number | null, signal: NodeJS.Signals | null): void {
    if (!this.alive) return;
    this.alive = false;
    for (const listener of this.exitListeners) listener(exitCode, signal);
  }
}

class StubRuntime implements WorkerRuntime {
  readonly handle = new StubHandle();
  readonly forgotten: string[] = [];
  async configure(): Promise<void> {}
  async launch(): Promise<WorkerHandle> {
    return this.handle;
  }
  attach(): WorkerHandle | null {
    return null;
  }
  async forgetLocalConfig(runnerDir: string): Promise<void> {
    this.forgotten.push(runnerDir);
  }
}

class StubDispatch implements DispatchClient {
  readonly deleted: number[] = [];
  async createRegistrationToken() {
    return { token: "reg-1", expiresAt: null };
  }
  async listRunners(): Promise<RemoteRunner[]> {
    return [];
  }
  async deleteRunner(_repository: string, _token: string, runnerId: number): Promise<boolean> {
    this.deleted.push(runnerId);
    return true;
  }
  async checkReachability() {
    return { ok: true as const, status: 200, latencyMs: 1 };
  }
}

async function startedRunner(opts: { ephemeral?: boolean } = {}) {
  const registry = RunnerRegistry.inMemory();
  const dispatch = new StubDispatch();
  const runtime = new StubRuntime();
  const logger = pino({ level: "silent" });
  const controller = new LifecycleController({
    registry,
    dispatch,
    runtime,
    logger,
    resolveRunnerDir: (name) => `/srv/runners/${name}`,
    pollIntervalMs: 5,
    gracePeriodMs: 200,
    startTimeoutMs: 1_000,
  });
  await registry.register({ name: "runner-1", repository: "org/repo", labels: ["self-hosted"], ephemeral: opts.ephemeral });
  await registry.transition("runner-1", "registered", { remoteId: 7 });
  await controller.start("runner-1");
  return { registry, dispatch, runtime, controller, logger };
}

describe("runner supervision", () => {
  it("shuts down and deregisters when interrupted", async () => {
    const { registry, dispatch, runtime, controller, logger } = await startedRunner();
    const stopping = new AbortController();
    const pending = superviseRunner({
      controller,
      registry,
      name: "runner-1",
      token: "test-token",
      remove: true,
      logger,
      signal: stopping.signal,
    });
    stopping.abort();

    const outcome = await pending;
    expect(outcome).toEqual({ reason: "signal", report: { stopped: ["runner-1"], removed: ["runner-1"], failures: [] } });
    expect(runtime.handle.signals).toEqual(["SIGTERM"]);
    expect(dispatch.deleted).toEqual([7]);
    expect(registry.require("runner-1")).toMatchObject({ registrationState: "unregistered", remoteId: null, pid: null });
  });

  it("keeps the registration on interrupt without --remove", async () => {
    const { registry, dispatch, controller, logger } = await startedRunner();
    const stopping = new AbortController();
    stopping.abort();

    const outcome = await superviseRunner({ controller, registry, name: "runner-1", token: "test-token", remove: false, logger, signal: stopping.signal });
    expect(outcome).toEqual({ reason: "signal", report: { stopped: ["runner-1"], removed: [], failures: [] } });
    expect(dispatch.deleted).toEqual([]);
    expect(registry.require("runner-1").registrationState).toBe("registered");
  });

  it("deregisters an ephemeral runner after its process exits", async () => {
    const { registry, dispatch, runtime, controller, logger } = await startedRunner({ ephemeral: true });
    const pending = superviseRunner({
      controller,
      registry,
      name: "runner-1",
      token: "test-token",
      remove: false,
      logger,
      signal: new AbortController().signal,
    });
    runtime.handle.exit(0, null);

    expect(await pending).toEqual({ reason: "exit", exitCode: 0, signal: null, removed: true });
    expect(dispatch.deleted).toEqual([7]);
    expect(runtime.forgotten).toEqual(["/srv/runners/runner-1"]);
    expect(registry.require("runner-1").registrationState).toBe("unregistered");
  });

  it("leaves a persistent runner registered after a crash", async () => {
    const { registry, dispatch, runtime, controller, logger } = await startedRunner();
    const pending = superviseRunner({
      controller,
      registry,
      name: "runner-1",
      token: "test-token",
      remove: false,
      logger,
      signal: new AbortController().signal,
    });
    runtime.handle.exit(1, null);

    expect(await pending).toEqual({ reason: "exit", exitCode: 1, signal: null, removed: false });
    expect(dispatch.deleted).toEqual([]);
  });
});
