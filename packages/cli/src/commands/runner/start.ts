import process from "node:process";
import { defineCommand } from "citty";
import type { Logger } from "pino";
import { coerceTrimmedString } from "@runnerctl/shared/lib/strings";
import { EXIT_CODES, InvalidStateError } from "@runnerctl/core/lib/errors";
import type { LifecycleController, ShutdownReport } from "@runnerctl/core/lib/runners/lifecycle";
import type { RunnerRegistry } from "@runnerctl/core/lib/runners/registry";
import { loadBaseContext, openRunnerContext } from "../../lib/context.js";
import { parseOptionalMs, stateArgs } from "../common.js";
import { loadRepositoryToken } from "./tokens.js";

export type SupervisionOutcome =
  | { reason: "signal"; report: ShutdownReport }
  | { reason: "exit"; exitCode: number | null; signal: NodeJS.Signals | null; removed: boolean };

function aborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
}

/**
 * Blocks until the runner process exits or `signal` aborts. On abort the
 * controller shuts down; either way an ephemeral runner (or any runner, with
 * `remove`) is deregistered afterwards.
 */
export async function superviseRunner(params: {
  controller: LifecycleController;
  registry: RunnerRegistry;
  name: string;
  token: string;
  remove: boolean;
  logger: Logger;
  signal: AbortSignal;
  gracePeriodMs?: number;
}): Promise<SupervisionOutcome> {
  const { controller, registry, name, logger } = params;
  const outcome = await Promise.race([
    controller.waitForExit(name).then((status) => ({ kind: "exit" as const, status })),
    aborted(params.signal).then(() => ({ kind: "signal" as const })),
  ]);

  if (outcome.kind === "signal") {
    logger.info("stopping runner");
    const report = await controller.shutdown({
      remove: params.remove,
      token: params.token,
      gracePeriodMs: params.gracePeriodMs,
    });
    const failure = report.failures[0];
    if (failure) throw failure.error;
    return { reason: "signal", report };
  }

  const exitCode = outcome.status?.exitCode ?? null;
  const exitSignal = outcome.status?.signal ?? null;
  logger.warn({ exitCode, signal: exitSignal }, "runner process exited");
  const instance = registry.require(name);
  const shouldRemove = (instance.ephemeral || params.remove) && instance.registrationState === "registered";
  if (shouldRemove) await controller.remove(name, params.token);
  return { reason: "exit", exitCode, signal: exitSignal, removed: shouldRemove };
}

export const runnerStart = defineCommand({
  meta: {
    name: "start",
    description: "Start a runner and supervise it in the foreground until it exits or SIGINT/SIGTERM arrives.",
  },
  args: {
    ...stateArgs,
    name: { type: "positional", description: "Runner name.", required: true },
    register: { type: "boolean", description: "Register first when the runner is not registered.", default: true },
    remove: { type: "boolean", description: "Remove the registration on shutdown (ephemeral runners always are).", default: false },
    "start-timeout": { type: "string", description: "Handshake timeout ms (default: config worker.startTimeoutMs)." },
    "grace-period": { type: "string", description: "SIGTERM grace period ms on shutdown (default: config worker.gracePeriodMs)." },
    "log-path": { type: "string", description: "Log file path (default: <home>/logs/<name>.jsonl)." },
    "file-log": { type: "boolean", description: "Also log to a file (disable with --no-file-log).", default: true },
  },
  async run({ args }) {
    const name = coerceTrimmedString(args.name);
    const startTimeoutMs = parseOptionalMs(args["start-timeout"], "start-timeout");
    const gracePeriodMs = parseOptionalMs(args["grace-period"], "grace-period");
    const base = await loadBaseContext({
      home: args.home,
      logLevel: args["log-level"],
      agent: { runnerName: name, logFile: args["log-path"], noLogFile: !args["file-log"] },
    });
    const ctx = await openRunnerContext(base);
    const instance = ctx.registry.require(name);
    const token = await loadRepositoryToken(ctx, instance.repository);

    const stopping = new AbortController();
    const stop = (signal: NodeJS.Signals) => {
      ctx.logger.info({ signal }, "signal received");
      stopping.abort();
    };
    process.on("SIGINT", stop);
    process.on("SIGTERM", stop);
    try {
      if (instance.registrationState !== "registered") {
        if (!args.register) {
          throw new InvalidStateError(name, `runner ${name} is ${instance.registrationState}`, `run: runnerctl runner register ${name}`);
        }
        await ctx.controller.register(name, token, { signal: stopping.signal });
      }
      const started = await ctx.controller.start(name, { signal: stopping.signal, timeoutMs: startTimeoutMs });
      ctx.logger.info({ pid: started.pid, repository: started.repository }, "supervising runner (Ctrl-C to stop)");

      const outcome = await superviseRunner({
        controller: ctx.controller,
        registry: ctx.registry,
        name,
        token,
        remove: args.remove,
        logger: ctx.logger,
        signal: stopping.signal,
        gracePeriodMs,
      });
      if (outcome.reason === "exit" && outcome.exitCode !== 0) process.exitCode = EXIT_CODES.generic;
    } finally {
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
    }
  },
});
