import fs from "node:fs/promises";
import path from "node:path";
import pino, { type Logger } from "pino";
import { RunnerNameSchema, RepositoryIdSchema, normalizeLabels } from "@runnerctl/shared/lib/identifiers";
import { ConflictError, CorruptRecordError, InvalidStateError, NotFoundError, ValidationError } from "../errors.js";
import { Mutex } from "../runtime/concurrency.js";
import { withFileLock } from "../storage/file-lock.js";
import { PRIVATE_FILE_MODE } from "../storage/fs-private.js";
import { readTextIfExists, writeJsonFileAtomic } from "../storage/fs-safe.js";
import {
  canTransition,
  RegistryFileSchema,
  type HealthSnapshot,
  type RegistrationState,
  type RunnerInstance,
  type RunnerInstancePatch,
} from "./types.js";

export type NewRunnerInstance = {
  name: string;
  repository: string;
  labels?: readonly string[];
  ephemeral?: boolean;
};

function cloneInstance(instance: RunnerInstance): RunnerInstance {
  return {
    ...instance,
    labels: [...instance.labels],
    warnings: [...instance.warnings],
    lastHealth: instance.lastHealth
      ? { ...instance.lastHealth, findings: instance.lastHealth.findings.map((f) => ({ ...f })) }
      : null,
  };
}

/**
 * Local runner instances, mirrored to runners.json after every change.
 *
 * Several processes share the file (one `runner start` per runner), so each
 * change re-reads it under `runners.json.lock`, applies itself to the fresh
 * copy and writes it back. Reads serve the copy from the last change or reload.
 */
export class RunnerRegistry {
  private readonly instances = new Map<string, RunnerInstance>();
  private readonly writeLock = new Mutex();
  private readonly filePath: string | null;
  private readonly logger: Logger;

  private constructor(params: { filePath: string | null; logger?: Logger }) {
    this.filePath = params.filePath;
    this.logger = params.logger ?? pino({ level: "silent" });
  }

  static inMemory(logger?: Logger): RunnerRegistry {
    return new RunnerRegistry({ filePath: null, logger });
  }

  static async open(params: { filePath: string; logger?: Logger }): Promise<RunnerRegistry> {
    const registry = new RunnerRegistry(params);
    await registry.reload();
    return registry;
  }

  async reload(): Promise<void> {
    if (!this.filePath) return;
    const raw = await readTextIfExists(this.filePath);
    this.instances.clear();
    if (raw === null) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new CorruptRecordError("registry", `runner registry is not valid JSON: ${this.filePath}`, err);
    }
    const result = RegistryFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new CorruptRecordError("registry", `runner registry is malformed: ${this.filePath}`, result.error);
    }
    for (const instance of result.data.instances) this.instances.set(instance.name, instance);
  }

  get(name: string): RunnerInstance | null {
    const instance = this.instances.get(name);
    return instance ? cloneInstance(instance) : null;
  }

  require(name: string): RunnerInstance {
    const instance = this.get(name);
    if (!instance) {
      throw new NotFoundError(name, `runner ${name} is not registered locally`, `run: runnerctl runner add ${name} --repo <owner/repo>`);
    }
    return instance;
  }

  list(): RunnerInstance[] {
    return Array.from(this.instances.values())
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(cloneInstance);
  }

  async register(input: NewRunnerInstance): Promise<RunnerInstance> {
    const name = RunnerNameSchema.safeParse(input.name);
    if (!name.success) throw new ValidationError(name.error.issues[0]?.message ?? "invalid runner name", input.name);
    const repository = RepositoryIdSchema.safeParse(input.repository);
    if (!repository.success) {
      throw new ValidationError(repository.error.issues[0]?.message ?? "invalid repository", input.name);
    }
    const labels = normalizeLabels(input.labels ?? []);
    const instance = await this.commit(() => {
      if (this.instances.has(name.data)) {
        throw new ConflictError(name.data, `runner ${name.data} already exists`);
      }
      const now = new Date().toISOString();
      const created: RunnerInstance = {
        name: name.data,
        repository: repository.data,
        labels,
        registrationState: "unregistered",
        remoteId: null,
        pid: null,
        startedAt: null,
        ephemeral: input.ephemeral ?? false,
        lastHealth: null,
        warnings: [],
        createdAt: now,
        updatedAt: now,
      };
      this.instances.set(created.name, created);
      return cloneInstance(created);
    });
    this.logger.debug({ runner: instance.name, repository: instance.repository }, "runner added");
    return instance;
  }

  async remove(name: string): Promise<void> {
    await this.commit(() => {
      const instance = this.require(name);
      if (instance.registrationState !== "unregistered") {
        throw new InvalidStateError(
          name,
          `runner ${name} is ${instance.registrationState}; only unregistered runners can be deleted`,
          `run: runnerctl runner remove ${name}`,
        );
      }
      if (instance.pid !== null) {
        throw new InvalidStateError(name, `runner ${name} still has a process attached (pid ${instance.pid})`, `run: runnerctl runner stop ${name}`);
      }
      this.instances.delete(name);
    });
  }

  async transition(name: string, next: RegistrationState, patch: RunnerInstancePatch = {}): Promise<RunnerInstance> {
    let from: RegistrationState = next;
    const updated = await this.commit(() => {
      const current = this.requireLive(name);
      if (!canTransition(current.registrationState, next)) {
        throw new InvalidStateError(name, `runner ${name} cannot move from ${current.registrationState} to ${next}`);
      }
      from = current.registrationState;
      const changed: RunnerInstance = {
        ...current,
        ...this.normalizePatch(patch),
        registrationState: next,
        updatedAt: new Date().toISOString(),
      };
      this.instances.set(name, changed);
      return cloneInstance(changed);
    });
    this.logger.debug({ runner: name, from, to: next }, "runner state changed");
    return updated;
  }

  async update(name: string, patch: RunnerInstancePatch): Promise<RunnerInstance> {
    return await this.commit(() => {
      const current = this.requireLive(name);
      const changed: RunnerInstance = { ...current, ...this.normalizePatch(patch), updatedAt: new Date().toISOString() };
      this.instances.set(name, changed);
      return cloneInstance(changed);
    });
  }

  async addWarning(name: string, warning: string): Promise<RunnerInstance> {
    return await this.commit(() => {
      const current = this.requireLive(name);
      if (current.warnings.includes(warning)) return cloneInstance(current);
      const changed: RunnerInstance = { ...current, warnings: [...current.warnings, warning], updatedAt: new Date().toISOString() };
      this.instances.set(name, changed);
      return cloneInstance(changed);
    });
  }

  async annotateHealth(name: string, health: HealthSnapshot): Promise<void> {
    await this.commit(() => {
      const current = this.instances.get(name);
      if (current) this.instances.set(name, { ...current, lastHealth: health });
    });
  }

  private normalizePatch(patch: RunnerInstancePatch): RunnerInstancePatch {
    const out: RunnerInstancePatch = { ...patch };
    if (patch.labels) out.labels = normalizeLabels(patch.labels);
    if (patch.warnings) out.warnings = [...patch.warnings];
    return out;
  }

  private requireLive(name: string): RunnerInstance {
    const current = this.instances.get(name);
    if (!current) return this.require(name);
    return current;
  }

  /**
   * Applies `change` to the on-disk state and writes it back. A change that
   * throws leaves the file untouched.
   */
  private async commit<T>(change: () => T): Promise<T> {
    const filePath = this.filePath;
    return await this.writeLock.runExclusive(async () => {
      if (!filePath) return change();
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      return await withFileLock(`${filePath}.lock`, async () => {
        await this.reload();
        const out = change();
        const instances = Array.from(this.instances.values()).sort((a, b) => a.name.localeCompare(b.name));
        await writeJsonFileAtomic(filePath, { version: 1, instances }, { mode: PRIVATE_FILE_MODE });
        return out;
      });
    });
  }
}
