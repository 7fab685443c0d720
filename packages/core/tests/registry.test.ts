import { access, mkdtemp, readFile, rm, utimes, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConflictError, CorruptRecordError, InvalidStateError, NotFoundError, ValidationError } from "../src/lib/errors";
import { RunnerRegistry } from "../src/lib/runners/registry";

describe("runner registry", () => {
  let dir = "";
  let filePath = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "runnerctl-registry-"));
    filePath = path.join(dir, "runners.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("adds instances as unregistered with normalized labels", async () => {
    const registry = RunnerRegistry.inMemory();
    const instance = await registry.register({
      name: "runner-1",
      repository: "org/repo",
      labels: ["self-hosted", "linux", "self-hosted"],
    });
    expect(instance).toMatchObject({
      name: "runner-1",
      repository: "org/repo",
      labels: ["linux", "self-hosted"],
      registrationState: "unregistered",
      remoteId: null,
      pid: null,
      ephemeral: false,
      lastHealth: null,
      warnings: [],
    });
  });

  it("rejects duplicates and invalid names", async () => {
    const registry = RunnerRegistry.inMemory();
    await registry.register({ name: "runner-1", repository: "org/repo" });
    await expect(registry.register({ name: "runner-1", repository: "org/other" })).rejects.toBeInstanceOf(ConflictError);
    await expect(registry.register({ name: "../escape", repository: "org/repo" })).rejects.toBeInstanceOf(ValidationError);
    await expect(registry.register({ name: "runner-2", repository: "org" })).rejects.toBeInstanceOf(ValidationError);
  });

  it("validates state transitions", async () => {
    const registry = RunnerRegistry.inMemory();
    await registry.register({ name: "runner-1", repository: "org/repo" });

    await expect(registry.transition("runner-1", "removing")).rejects.toBeInstanceOf(InvalidStateError);
    await registry.transition("runner-1", "registering");
    const registered = await registry.transition("runner-1", "registered", { remoteId: 7 });
    expect(registered.registrationState).toBe("registered");
    expect(registered.remoteId).toBe(7);
    await expect(registry.transition("runner-1", "registering")).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("only deletes unregistered instances", async () => {
    const registry = RunnerRegistry.inMemory();
    await registry.register({ name: "runner-1", repository: "org/repo" });
    await registry.transition("runner-1", "registered");
    await expect(registry.remove("runner-1")).rejects.toBeInstanceOf(InvalidStateError);

    await registry.transition("runner-1", "unregistered");
    await registry.remove("runner-1");
    expect(registry.get("runner-1")).toBeNull();
    expect(() => registry.require("runner-1")).toThrow(NotFoundError);
  });

  it("returns copies, not live records", async () => {
    const registry = RunnerRegistry.inMemory();
    const created = await registry.register({ name: "runner-1", repository: "org/repo", labels: ["linux"] });
    created.labels.push("mutated");
    created.warnings.push("mutated");
    expect(registry.require("runner-1").labels).toEqual(["linux"]);
    expect(registry.require("runner-1").warnings).toEqual([]);
  });

  it("annotates health without touching anything else", async () => {
    const registry = RunnerRegistry.inMemory();
    const before = await registry.register({ name: "runner-1", repository: "org/repo" });
    const health = { verdict: "healthy" as const, findings: [], checkedAt: "2026-01-01T00:00:00.000Z" };
    await registry.annotateHealth("runner-1", health);
    expect(registry.require("runner-1")).toEqual({ ...before, lastHealth: health });
  });

  it("persists to disk and reloads", async () => {
    const registry = await RunnerRegistry.open({ filePath });
    await registry.register({ name: "runner-b", repository: "org/repo" });
    await registry.register({ name: "runner-a", repository: "org/repo", ephemeral: true });
    await registry.transition("runner-a", "registering");
    await registry.addWarning("runner-a", "note");
    await registry.addWarning("runner-a", "note");

    const reopened = await RunnerRegistry.open({ filePath });
    expect(reopened.list().map((i) => i.name)).toEqual(["runner-a", "runner-b"]);
    expect(reopened.require("runner-a")).toMatchObject({ registrationState: "registering", ephemeral: true, warnings: ["note"] });
    expect(await readFile(filePath, "utf8")).toContain('"version": 1');
  });

  it("refuses a corrupt registry file", async () => {
    await writeFile(filePath, "[]", "utf8");
    await expect(RunnerRegistry.open({ filePath })).rejects.toBeInstanceOf(CorruptRecordError);
  });

  it("keeps changes made through another handle on the same file", async () => {
    const seed = await RunnerRegistry.open({ filePath });
    await seed.register({ name: "r1", repository: "org/repo" });

    const a = await RunnerRegistry.open({ filePath });
    const b = await RunnerRegistry.open({ filePath });
    await b.register({ name: "r2", repository: "org/repo" });
    await b.transition("r2", "registering");
    await b.transition("r2", "registered", { remoteId: 42 });
    await a.update("r1", { pid: null });

    const reopened = await RunnerRegistry.open({ filePath });
    expect(reopened.list().map((i) => i.name)).toEqual(["r1", "r2"]);
    expect(reopened.require("r2")).toMatchObject({ registrationState: "registered", remoteId: 42 });
    expect(a.require("r2").registrationState).toBe("registered");
  });

  it("checks conflicts against the file, not the cached copy", async () => {
    const a = await RunnerRegistry.open({ filePath });
    const b = await RunnerRegistry.open({ filePath });
    await b.register({ name: "r1", repository: "org/repo" });
    await expect(a.register({ name: "r1", repository: "org/other" })).rejects.toBeInstanceOf(ConflictError);
    expect(a.require("r1").repository).toBe("org/repo");
  });

  it("releases the file lock and takes over a stale one", async () => {
    const registry = await RunnerRegistry.open({ filePath });
    await registry.register({ name: "r1", repository: "org/repo" });
    await expect(access(`${filePath}.lock`)).rejects.toMatchObject({ code: "ENOENT" });

    await writeFile(`${filePath}.lock`, "99999\n", "utf8");
    const old = new Date(Date.now() - 120_000);
    await utimes(`${filePath}.lock`, old, old);
    await registry.update("r1", { labels: ["gpu"] });
    expect((await RunnerRegistry.open({ filePath })).require("r1").labels).toEqual(["gpu"]);
  });
});
