import { describe, expect, it } from "vitest";
import { InvalidStateError, RemoteApiError, StartTimeoutError, StopTimeoutError, WorkerProcessError } from "../src/lib/errors";
import {
  LifecycleController,
  LOCAL_CLEANUP_WARNING,
  REMOTE_CLEANUP_WARNING,
  type LifecycleControllerOptions,
} from "../src/lib/runners/lifecycle";
import { RunnerRegistry } from "../src/lib/runners/registry";
import {
  authError,
  configureFailure,
  FakeDispatchClient,
  FakeWorkerHandle,
  FakeWorkerRuntime,
  transientError,
} from "./helpers/fakes";
import { createCapturingLogger, LEVEL_WARN } from "./helpers/logger";

const TOKEN = "test-token";

async function setup(overrides: Partial<LifecycleControllerOptions> = {}) {
  const registry = RunnerRegistry.inMemory();
  const dispatch = new FakeDispatchClient();
  const runtime = new FakeWorkerRuntime(dispatch);
  const { logger, logs } = createCapturingLogger();
  const controller = new LifecycleController({
    registry,
    dispatch,
    runtime,
    logger,
    resolveRunnerDir: (name) => `/srv/runners/${name}`,
    retryDelayMs: 0,
    pollIntervalMs: 5,
    gracePeriodMs: 200,
    killConfirmMs: 50,
    startTimeoutMs: 1_000,
    ...overrides,
  });
  await registry.register({ name: "runner-1", repository: "org/repo", labels: ["self-hosted", "linux"] });
  return { registry, dispatch, runtime, controller, logs };
}

async function running(overrides: Partial<LifecycleControllerOptions> = {}) {
  const ctx = await setup(overrides);
  await ctx.controller.register("runner-1", TOKEN);
  await ctx.controller.start("runner-1");
  const handle = ctx.runtime.launches[0];
  if (!handle) throw new Error("runner was not launched");
  return { ...ctx, handle };
}

describe("lifecycle register", () => {
  it("registers through a registration token and the configure step", async () => {
    const { controller, dispatch, runtime } = await setup();
    const instance = await controller.register("runner-1", TOKEN);

    expect(instance.registrationState).toBe("registered");
    expect(instance.remoteId).toBe(100);
    expect(dispatch.registrationCalls).toBe(1);
    expect(runtime.configureCalls).toHaveLength(1);
    expect(runtime.configureCalls[0]).toMatchObject({
      name: "runner-1",
      runnerDir: "/srv/runners/runner-1",
      repositoryUrl: "https://github.com/org/repo",
      registrationToken: "reg-1",
      labels: ["linux", "self-hosted"],
      workDirectory: "_work",
      ephemeral: false,
      replace: true,
    });
  });

  it("is a no-op when already registered", async () => {
    const { controller, dispatch } = await setup();
    await controller.register("runner-1", TOKEN);
    const again = await controller.register("runner-1", TOKEN);
    expect(again.registrationState).toBe("registered");
    expect(dispatch.registrationCalls).toBe(1);
  });

  it("registers once under concurrent calls", async () => {
    const { controller, dispatch, runtime } = await setup();
    const [a, b] = await Promise.all([controller.register("runner-1", TOKEN), controller.register("runner-1", TOKEN)]);
    expect(a.registrationState).toBe("registered");
    expect(b.registrationState).toBe("registered");
    expect(dispatch.registrationCalls).toBe(1);
    expect(runtime.configureCalls).toHaveLength(1);
    expect(dispatch.runners.get("org/repo")).toHaveLength(1);
  });

  it("retries one transient failure", async () => {
    const { controller, dispatch } = await setup();
    dispatch.failures.registration.push(transientError());
    const instance = await controller.register("runner-1", TOKEN);
    expect(instance.registrationState).toBe("registered");
    expect(dispatch.registrationCalls).toBe(2);
  });

  it("gives up after a second transient failure and rolls back", async () => {
    const { controller, dispatch, registry } = await setup();
    dispatch.failures.registration.push(transientError(), transientError());
    await expect(controller.register("runner-1", TOKEN)).rejects.toBeInstanceOf(RemoteApiError);
    expect(dispatch.registrationCalls).toBe(2);
    expect(registry.require("runner-1").registrationState).toBe("unregistered");
  });

  it("does not retry auth failures", async () => {
    const { controller, dispatch, registry } = await setup();
    dispatch.failures.registration.push(authError());
    await expect(controller.register("runner-1", TOKEN)).rejects.toMatchObject({ category: "auth", remoteAmbiguous: false });
    expect(dispatch.registrationCalls).toBe(1);
    expect(registry.require("runner-1")).toMatchObject({ registrationState: "unregistered", warnings: [] });
  });

  it("flags a failed configure step as remotely ambiguous", async () => {
    const { controller, runtime, registry } = await setup();
    runtime.configureFailures.push(configureFailure("runner-1"));

    const err = await controller.register("runner-1", TOKEN).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(WorkerProcessError);
    expect(err instanceof WorkerProcessError && err.remoteAmbiguous).toBe(true);
    const instance = registry.require("runner-1");
    expect(instance.registrationState).toBe("unregistered");
    expect(instance.warnings).toEqual(["registration may exist on GitHub; run `runnerctl runner reconcile`"]);
  });
});

describe("lifecycle start", () => {
  it("requires a registration", async () => {
    const { controller } = await setup();
    await expect(controller.start("runner-1")).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("attaches the process once the handshake line appears", async () => {
    const { controller, registry, runtime, handle } = await running();
    expect(controller.isRunning("runner-1")).toBe(true);
    expect(registry.require("runner-1").pid).toBe(handle.pid);

    await controller.start("runner-1");
    expect(runtime.launches).toHaveLength(1);
  });

  it("terminates the process and times out without a handshake", async () => {
    const { controller, runtime, registry } = await setup();
    await controller.register("runner-1", TOKEN);
    runtime.behavior = { handshake: "never" };

    await expect(controller.start("runner-1", { timeoutMs: 10 })).rejects.toBeInstanceOf(StartTimeoutError);
    expect(runtime.launches[0]?.signals).toEqual(["SIGTERM"]);
    expect(controller.isRunning("runner-1")).toBe(false);
    expect(registry.require("runner-1").pid).toBeNull();
  });

  it("fails when the process exits before the handshake", async () => {
    const { controller, runtime } = await setup();
    await controller.register("runner-1", TOKEN);
    runtime.behavior = { handshake: "exit" };

    const err = await controller.start("runner-1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(WorkerProcessError);
    expect(err instanceof WorkerProcessError ? err.stderrTail : "").toBe("could not connect to GitHub");
  });

  it("honors an aborted signal", async () => {
    const { controller, runtime } = await setup();
    await controller.register("runner-1", TOKEN);
    runtime.behavior = { handshake: "never" };
    const ac = new AbortController();
    setTimeout(() => ac.abort(), 10);
    await expect(controller.start("runner-1", { signal: ac.signal })).rejects.toMatchObject({ name: "AbortError" });
    expect(controller.isRunning("runner-1")).toBe(false);
    expect(runtime.launches[0]?.signals).toEqual(["SIGTERM"]);
  });

  it("gives an aborted start the grace period before SIGKILL", async () => {
    const { controller, runtime, registry } = await setup({ gracePeriodMs: 30 });
    await controller.register("runner-1", TOKEN);
    runtime.behavior = { handshake: "never", ignoreSigterm: true };
    const ac = new AbortController();
    setTimeout(() => ac.abort(), 10);

    await expect(controller.start("runner-1", { signal: ac.signal })).rejects.toMatchObject({ name: "AbortError" });
    expect(runtime.launches[0]?.signals).toEqual(["SIGTERM", "SIGKILL"]);
    expect(registry.require("runner-1").pid).toBeNull();
  });

  it("clears the pid when the process exits on its own", async () => {
    const { controller, registry, handle } = await running();
    handle.exit(0, null);
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(controller.isRunning("runner-1")).toBe(false);
    expect(registry.require("runner-1").pid).toBeNull();
  });

  it("waits for the attached process to exit", async () => {
    const { controller, handle } = await running();
    const waiting = controller.waitForExit("runner-1");
    handle.exit(3, null);
    await expect(waiting).resolves.toEqual({ exitCode: 3, signal: null });
    await expect(controller.waitForExit("runner-1")).resolves.toBeNull();
  });
});

describe("lifecycle stop", () => {
  it("stops gracefully and is idempotent", async () => {
    const { controller, registry, handle } = await running();

    const stopped = await controller.stop("runner-1");
    expect(stopped.pid).toBeNull();
    expect(handle.signals).toEqual(["SIGTERM"]);

    const again = await controller.stop("runner-1");
    expect(again.pid).toBeNull();
    expect(handle.signals).toEqual(["SIGTERM"]);
    expect(registry.require("runner-1").registrationState).toBe("registered");
  });

  it("escalates to SIGKILL after the grace period with a warning", async () => {
    const { controller, runtime, logs } = await setup();
    runtime.behavior = { handshake: "immediate", ignoreSigterm: true };
    await controller.register("runner-1", TOKEN);
    await controller.start("runner-1");

    await controller.stop("runner-1", { gracePeriodMs: 20 });
    expect(runtime.launches[0]?.signals).toEqual(["SIGTERM", "SIGKILL"]);
    expect(logs.some((l) => l.level === LEVEL_WARN && l.msg.includes("sending SIGKILL"))).toBe(true);
  });

  it("escalates immediately when aborted during the grace period", async () => {
    const { controller, runtime } = await setup();
    runtime.behavior = { handshake: "immediate", ignoreSigterm: true };
    await controller.register("runner-1", TOKEN);
    await controller.start("runner-1");

    const ac = new AbortController();
    setTimeout(() => ac.abort(), 10);
    const started = Date.now();
    await controller.stop("runner-1", { gracePeriodMs: 10_000, signal: ac.signal });
    expect(Date.now() - started).toBeLessThan(5_000);
    expect(runtime.launches[0]?.signals).toEqual(["SIGTERM", "SIGKILL"]);
  });

  it("skips SIGTERM when not graceful", async () => {
    const { controller, handle } = await running();
    await controller.stop("runner-1", { graceful: false });
    expect(handle.signals).toEqual(["SIGKILL"]);
  });

  it("reports a process that survives SIGKILL", async () => {
    const { controller, runtime } = await setup();
    runtime.behavior = { handshake: "immediate", ignoreSigterm: true, ignoreSigkill: true };
    await controller.register("runner-1", TOKEN);
    await controller.start("runner-1");

    await expect(controller.stop("runner-1", { gracePeriodMs: 10 })).rejects.toBeInstanceOf(StopTimeoutError);
    expect(controller.isRunning("runner-1")).toBe(true);
  });
});

describe("lifecycle remove", () => {
  it("refuses while the process is running", async () => {
    const { controller } = await running();
    await expect(controller.remove("runner-1", TOKEN)).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("deletes the remote runner and local registration", async () => {
    const { controller, dispatch, runtime } = await running();
    await controller.stop("runner-1");

    const removed = await controller.remove("runner-1", TOKEN);
    expect(removed).toMatchObject({ registrationState: "unregistered", remoteId: null });
    expect(dispatch.deleteCalls).toEqual([100]);
    expect(dispatch.runners.get("org/repo")).toEqual([]);
    expect(runtime.forgotten).toEqual(["/srv/runners/runner-1"]);

    await controller.remove("runner-1", TOKEN);
    expect(dispatch.deleteCalls).toEqual([100]);
  });

  it("counts a runner already gone on GitHub as removed", async () => {
    const { controller, dispatch } = await setup();
    await controller.register("runner-1", TOKEN);
    dispatch.runners.set("org/repo", []);
    const removed = await controller.remove("runner-1", TOKEN);
    expect(removed.registrationState).toBe("unregistered");
  });

  it("finds the runner by name when GitHub gave it a new id", async () => {
    const { controller, dispatch, registry } = await setup();
    await controller.register("runner-1", TOKEN);
    expect(registry.require("runner-1").remoteId).toBe(100);
    dispatch.runners.set("org/repo", []);
    dispatch.addRunner("org/repo", "runner-1");

    const removed = await controller.remove("runner-1", TOKEN);
    expect(removed.registrationState).toBe("unregistered");
    expect(dispatch.deleteCalls).toEqual([100, 101]);
    expect(dispatch.runners.get("org/repo")).toEqual([]);
  });

  it("stays unregistered when only the local cleanup fails", async () => {
    const { controller, dispatch, runtime, registry } = await setup();
    await controller.register("runner-1", TOKEN);
    runtime.forgetFailures.push(new Error("EACCES: permission denied, unlink '/srv/runners/runner-1/.runner'"));

    const removed = await controller.remove("runner-1", TOKEN);
    expect(removed.registrationState).toBe("unregistered");
    expect(removed.warnings).toEqual([`${LOCAL_CLEANUP_WARNING}: EACCES: permission denied, unlink '/srv/runners/runner-1/.runner'`]);
    expect(dispatch.runners.get("org/repo")).toEqual([]);
    expect(registry.require("runner-1").remoteId).toBeNull();
  });

  it("keeps the runner registered when the remote call fails", async () => {
    const { controller, dispatch, registry } = await setup();
    await controller.register("runner-1", TOKEN);
    dispatch.failures.delete.push(transientError());

    await expect(controller.remove("runner-1", TOKEN)).rejects.toBeInstanceOf(RemoteApiError);
    expect(dispatch.deleteCalls).toEqual([100]);
    const instance = registry.require("runner-1");
    expect(instance.registrationState).toBe("registered");
    expect(instance.warnings).toEqual(["remote removal failed: /repos/org/repo/actions/runners failed: http 502"]);
  });

  it("forces local removal and records the incomplete cleanup", async () => {
    const { controller, dispatch, runtime, logs } = await setup();
    await controller.register("runner-1", TOKEN);
    dispatch.failures.delete.push(transientError());

    const removed = await controller.remove("runner-1", TOKEN, { force: true });
    expect(removed.registrationState).toBe("unregistered");
    expect(removed.warnings).toEqual([REMOTE_CLEANUP_WARNING]);
    expect(runtime.forgotten).toEqual(["/srv/runners/runner-1"]);
    expect(logs.some((l) => l.level === LEVEL_WARN && l.msg === "remote removal failed; forcing local removal")).toBe(true);
  });
});

describe("lifecycle reconcile", () => {
  it("trusts GitHub when the local state disagrees", async () => {
    const { controller, dispatch, registry } = await setup();
    await registry.register({ name: "runner-2", repository: "org/repo" });
    await controller.register("runner-1", TOKEN);
    dispatch.runners.set("org/repo", []);
    const adopted = dispatch.addRunner("org/repo", "runner-2");

    const report = await controller.reconcile(TOKEN);
    expect(report).toEqual([
      { name: "runner-1", actions: ["registration missing on GitHub; marked unregistered"] },
      { name: "runner-2", actions: [`adopted existing GitHub runner ${adopted.id}`] },
    ]);
    expect(registry.require("runner-1").registrationState).toBe("unregistered");
    expect(registry.require("runner-2")).toMatchObject({ registrationState: "registered", remoteId: adopted.id });
  });

  it("settles interrupted operations", async () => {
    const { controller, dispatch, registry, runtime } = await setup();
    await registry.register({ name: "runner-2", repository: "org/repo" });
    await registry.transition("runner-1", "registering");
    await registry.transition("runner-2", "registered", { remoteId: 555 });
    await registry.transition("runner-2", "removing");
    const remote = dispatch.addRunner("org/repo", "runner-1");

    await controller.reconcile(TOKEN);
    expect(registry.require("runner-1")).toMatchObject({ registrationState: "registered", remoteId: remote.id });
    expect(registry.require("runner-2").registrationState).toBe("unregistered");
    expect(runtime.forgotten).toEqual(["/srv/runners/runner-2"]);
  });

  it("clears dead pids and re-attaches live ones", async () => {
    const { controller, registry, runtime, handle } = await running();
    await registry.register({ name: "runner-2", repository: "org/repo" });
    await registry.update("runner-2", { pid: 999_999, startedAt: "2026-01-01T00:00:00.000Z" });

    const fresh = new LifecycleController({
      registry,
      dispatch: new FakeDispatchClient(),
      runtime,
      resolveRunnerDir: (name) => `/srv/runners/${name}`,
    });
    runtime.attachable.set(handle.pid, handle);

    const report = await fresh.reconcile();
    expect(report).toEqual([
      { name: "runner-1", actions: [`re-attached running process ${handle.pid}`] },
      { name: "runner-2", actions: ["cleared stale pid 999999"] },
    ]);
    expect(fresh.isRunning("runner-1")).toBe(true);
    expect(registry.require("runner-2").pid).toBeNull();
    expect(controller.isRunning("runner-1")).toBe(true);
  });
});

describe("lifecycle shutdown", () => {
  it("stops everything and removes ephemeral runners", async () => {
    const { controller, registry } = await setup();
    await registry.register({ name: "runner-2", repository: "org/repo", ephemeral: true });
    await controller.register("runner-1", TOKEN);
    await controller.register("runner-2", TOKEN);
    await controller.start("runner-1");
    await controller.start("runner-2");

    const report = await controller.shutdown({ token: TOKEN });
    expect(report).toEqual({ stopped: ["runner-1", "runner-2"], removed: ["runner-2"], failures: [] });
    expect(controller.runningNames()).toEqual([]);
    expect(registry.require("runner-1").registrationState).toBe("registered");
    expect(registry.require("runner-2").registrationState).toBe("unregistered");
  });

  it("removes only what it stopped, resolving tokens per repository", async () => {
    const { controller, registry, dispatch } = await setup();
    await registry.register({ name: "idle", repository: "org/other" });
    await controller.register("runner-1", TOKEN);
    await controller.register("idle", TOKEN);
    await controller.start("runner-1");

    const asked: string[] = [];
    const report = await controller.shutdown({
      remove: true,
      token: async (repository) => {
        asked.push(repository);
        return TOKEN;
      },
    });
    expect(report).toEqual({ stopped: ["runner-1"], removed: ["runner-1"], failures: [] });
    expect(asked).toEqual(["org/repo"]);
    expect(registry.require("idle").registrationState).toBe("registered");
    expect(dispatch.runners.get("org/other")).toHaveLength(1);
  });

  it("stops processes started elsewhere when asked to include recorded pids", async () => {
    const { controller, registry, runtime, dispatch } = await setup();
    await registry.register({ name: "runner-2", repository: "org/repo" });
    await controller.register("runner-1", TOKEN);
    await controller.register("runner-2", TOKEN);

    const handle = new FakeWorkerHandle(5001, { handshake: "never" });
    runtime.attachable.set(handle.pid, handle);
    await registry.update("runner-2", { pid: handle.pid, startedAt: "2026-01-01T00:00:00.000Z" });

    expect(await controller.shutdown()).toEqual({ stopped: [], removed: [], failures: [] });
    const report = await controller.shutdown({ includeRecorded: true, graceful: false });
    expect(report).toEqual({ stopped: ["runner-2"], removed: [], failures: [] });
    expect(handle.signals).toEqual(["SIGKILL"]);
    expect(registry.require("runner-2").pid).toBeNull();
    expect(dispatch.deleteCalls).toEqual([]);
  });
});
