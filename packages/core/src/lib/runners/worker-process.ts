import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import readline from "node:readline";
import type { Readable } from "node:stream";
import { WorkerProcessError } from "../errors.js";
import { isAbortError } from "../runtime/abort.js";
import { redactValues } from "../runtime/redaction.js";
import { pathExists, removeIfExists } from "../storage/fs-safe.js";
import { runScript, type ScriptResult } from "./exec.js";

export type WorkerStream = "stdout" | "stderr";
export type LineListener = (line: string, stream: WorkerStream) => void;
export type ExitListener = (exitCode: number | null, signal: NodeJS.Signals | null) => void;

/**
 * A running runner agent. Handles are owned by the lifecycle controller; the
 * registry only ever sees the pid.
 */
export interface WorkerHandle {
  readonly pid: number | null;
  isAlive(): boolean;
  onLine(listener: LineListener): () => void;
  onExit(listener: ExitListener): () => void;
  kill(signal: NodeJS.Signals): boolean;
}

export type WorkerConfigureSpec = {
  name: string;
  runnerDir: string;
  repositoryUrl: string;
  registrationToken: string;
  labels: readonly string[];
  workDirectory: string;
  ephemeral: boolean;
  replace: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type WorkerLaunchSpec = {
  name: string;
  runnerDir: string;
};

export interface WorkerRuntime {
  configure(spec: WorkerConfigureSpec): Promise<void>;
  launch(spec: WorkerLaunchSpec): Promise<WorkerHandle>;
  // Handle for a process started by an earlier invocation; null when it is gone.
  attach(pid: number): WorkerHandle | null;
  forgetLocalConfig(runnerDir: string): Promise<void>;
}

// Files config.sh leaves behind once a runner is registered.
export const LOCAL_REGISTRATION_FILES = [".runner", ".credentials", ".credentials_rsaparams"] as const;

export type ChildLike = EventEmitter & {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
};

export class ChildWorkerHandle implements WorkerHandle {
  private readonly child: ChildLike;
  private readonly lineListeners = new Set<LineListener>();
  private readonly exitListeners = new Set<ExitListener>();
  private exited: { exitCode: number | null; signal: NodeJS.Signals | null } | null = null;

  constructor(child: ChildLike) {
    this.child = child;
    this.pipeLines(child.stdout, "stdout");
    this.pipeLines(child.stderr, "stderr");
    child.once("exit", (exitCode: number | null, signal: NodeJS.Signals | null) => {
      this.markExited(exitCode, signal);
    });
    child.once("error", () => {
      this.markExited(child.exitCode, child.signalCode);
    });
  }

  get pid(): number | null {
    return this.child.pid ?? null;
  }

  isAlive(): boolean {
    return this.exited === null && this.child.exitCode === null && this.child.signalCode === null;
  }

  onLine(listener: LineListener): () => void {
    this.lineListeners.add(listener);
    return () => this.lineListeners.delete(listener);
  }

  onExit(listener: ExitListener): () => void {
    const exited = this.exited;
    if (exited) {
      queueMicrotask(() => listener(exited.exitCode, exited.signal));
      return () => undefined;
    }
    this.exitListeners.add(listener);
    return () => this.exitListeners.delete(listener);
  }

  kill(signal: NodeJS.Signals): boolean {
    if (!this.isAlive()) return false;
    return this.child.kill(signal);
  }

  private pipeLines(stream: Readable | null, name: WorkerStream): void {
    if (!stream) return;
    const rl = readline.createInterface({ input: stream, crlfDelay: Infinity });
    rl.on("line", (line) => {
      for (const listener of this.lineListeners) listener(line, name);
    });
  }

  private markExited(exitCode: number | null, signal: NodeJS.Signals | null): void {
    if (this.exited) return;
    this.exited = { exitCode, signal };
    for (const listener of this.exitListeners) listener(exitCode, signal);
    this.exitListeners.clear();
  }
}

export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the pid exists but belongs to someone else.
    return typeof err === "object" && err !== null && "code" in err && err.code === "EPERM";
  }
}

/**
 * Pid-only handle for a process this invocation did not spawn. No output, and
 * exit is detected by polling.
 */
export class AttachedWorkerHandle implements WorkerHandle {
  readonly pid: number;
  private readonly pollMs: number;

  constructor(pid: number, pollMs = 500) {
    this.pid = pid;
    this.pollMs = pollMs;
  }

  isAlive(): boolean {
    return isPidAlive(this.pid);
  }

  onLine(): () => void {
    return () => undefined;
  }

  onExit(listener: ExitListener): () => void {
    const timer = setInterval(() => {
      if (this.isAlive()) return;
      clearInterval(timer);
      listener(null, null);
    }, this.pollMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  kill(signal: NodeJS.Signals): boolean {
    try {
      return process.kill(this.pid, signal);
    } catch {
      return false;
    }
  }
}

const CONFIGURE_TIMEOUT_MS = 120_000;

export function buildConfigureArgs(spec: WorkerConfigureSpec): string[] {
  const args = [
    "--unattended",
    "--url",
    spec.repositoryUrl,
    "--token",
    spec.registrationToken,
    "--name",
    spec.name,
    "--labels",
    spec.labels.join(","),
    "--work",
    spec.workDirectory,
  ];
  if (spec.ephemeral) args.push("--ephemeral");
  if (spec.replace) args.push("--replace");
  return args;
}

/**
 * Runs the GitHub runner agent scripts found in each runner directory.
 */
export class LocalWorkerRuntime implements WorkerRuntime {
  private readonly configureScript: string;
  private readonly runScript: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(params: { configureScript?: string; runScript?: string; env?: NodeJS.ProcessEnv } = {}) {
    this.configureScript = params.configureScript ?? "config.sh";
    this.runScript = params.runScript ?? "run.sh";
    this.env = params.env ?? process.env;
  }

  async configure(spec: WorkerConfigureSpec): Promise<void> {
    const script = await this.requireScript(spec.name, spec.runnerDir, this.configureScript);
    let result: ScriptResult;
    try {
      result = await runScript({
        script,
        args: buildConfigureArgs(spec),
        cwd: spec.runnerDir,
        env: this.env,
        timeoutMs: spec.timeoutMs ?? CONFIGURE_TIMEOUT_MS,
        signal: spec.signal,
      });
    } catch (err) {
      if (isAbortError(err)) throw err;
      throw new WorkerProcessError({
        subject: spec.name,
        message: `${this.configureScript} failed for ${spec.name}: ${err instanceof Error ? err.message : String(err)}`,
        exitCode: null,
      });
    }
    if (result.exitCode !== 0) {
      throw new WorkerProcessError({
        subject: spec.name,
        message: `${this.configureScript} exited with ${result.exitCode ?? result.signal ?? "unknown status"} for ${spec.name}`,
        exitCode: result.exitCode,
        stderrTail: redactValues(result.outputTail, [spec.registrationToken]),
      });
    }
  }

  async launch(spec: WorkerLaunchSpec): Promise<WorkerHandle> {
    const script = await this.requireScript(spec.name, spec.runnerDir, this.runScript);
    const child = spawn(script, [], {
      cwd: spec.runnerDir,
      env: this.env,
      stdio: ["ignore", "pipe", "pipe"],
    });
    return new ChildWorkerHandle(child);
  }

  attach(pid: number): WorkerHandle | null {
    return isPidAlive(pid) ? new AttachedWorkerHandle(pid) : null;
  }

  async forgetLocalConfig(runnerDir: string): Promise<void> {
    for (const file of LOCAL_REGISTRATION_FILES) {
      await removeIfExists(path.join(runnerDir, file));
    }
  }

  private async requireScript(name: string, runnerDir: string, script: string): Promise<string> {
    const full = path.resolve(runnerDir, script);
    if (!(await pathExists(full))) {
      throw new WorkerProcessError({
        subject: name,
        message: `runner agent script not found: ${full} (extract the GitHub runner package into ${runnerDir})`,
        exitCode: null,
      });
    }
    await fs.access(full, fs.constants.X_OK).catch((err: unknown) => {
      throw new WorkerProcessError({
        subject: name,
        message: `runner agent script is not executable: ${full} (${err instanceof Error ? err.message : String(err)})`,
        exitCode: null,
      });
    });
    return full;
  }
}
