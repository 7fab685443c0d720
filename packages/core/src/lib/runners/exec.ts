import { spawn } from "node:child_process";
import readline from "node:readline";
import { createAbortError } from "../runtime/abort.js";

const KILL_GRACE_MS = 500;

/**
 * Ring of the most recent output lines, across stdout and stderr.
 */
export class LineTail {
  private readonly maxLines: number;
  private readonly lines: string[] = [];
  private dropped = 0;

  constructor(maxLines: number) {
    this.maxLines = Math.max(0, Math.trunc(maxLines));
  }

  push(line: string): void {
    if (this.maxLines <= 0) {
      this.dropped += 1;
      return;
    }
    this.lines.push(line);
    if (this.lines.length > this.maxLines) {
      this.lines.shift();
      this.dropped += 1;
    }
  }

  get truncated(): boolean {
    return this.dropped > 0;
  }

  toString(): string {
    return this.lines.join("\n").trim();
  }
}

export type ScriptResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  durationMs: number;
  outputTail: string;
};

export class ScriptTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(script: string, timeoutMs: number) {
    super(`${script} timed out after ${timeoutMs}ms`);
    this.name = "ScriptTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Runs a one-shot agent script (config.sh) to completion. On timeout or abort
 * the child gets SIGTERM, then SIGKILL, before the promise rejects.
 */
export async function runScript(params: {
  script: string;
  args: readonly string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
  signal?: AbortSignal;
  tailLines?: number;
}): Promise<ScriptResult> {
  const startedAt = Date.now();
  if (params.signal?.aborted) throw createAbortError(`${params.script} aborted`);

  return await new Promise<ScriptResult>((resolve, reject) => {
    const tail = new LineTail(params.tailLines ?? 40);
    let failure: Error | null = null;
    let settled = false;
    let killTimer: NodeJS.Timeout | null = null;

    const child = spawn(params.script, [...params.args], {
      cwd: params.cwd,
      env: params.env,
      stdio: ["ignore", "pipe", "pipe"],
    });
    for (const stream of [child.stdout, child.stderr]) {
      if (stream) readline.createInterface({ input: stream, crlfDelay: Infinity }).on("line", (line) => tail.push(line));
    }

    const finish = (outcome: { ok: ScriptResult } | { err: Error }) => {
      if (settled) return;
      settled = true;
      clearTimeout(deadline);
      if (killTimer) clearTimeout(killTimer);
      params.signal?.removeEventListener("abort", onAbort);
      if ("err" in outcome) reject(outcome.err);
      else resolve(outcome.ok);
    };

    const terminate = (err: Error) => {
      if (failure) return;
      failure = err;
      child.kill("SIGTERM");
      killTimer = setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS);
    };

    const timeoutMs = Math.max(1, Math.trunc(params.timeoutMs));
    const deadline = setTimeout(() => terminate(new ScriptTimeoutError(params.script, timeoutMs)), timeoutMs);
    function onAbort(): void {
      terminate(createAbortError(`${params.script} aborted`));
    }
    params.signal?.addEventListener("abort", onAbort, { once: true });

    child.on("error", (err) => finish({ err }));
    child.on("close", (exitCode, signal) => {
      if (failure) {
        finish({ err: failure });
        return;
      }
      finish({ ok: { exitCode, signal, durationMs: Math.max(0, Date.now() - startedAt), outputTail: tail.toString() } });
    });
  });
}
