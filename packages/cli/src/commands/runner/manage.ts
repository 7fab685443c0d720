import process from "node:process";
import { defineCommand } from "citty";
import { coerceTrimmedString, splitCsv } from "@runnerctl/shared/lib/strings";
import { DEFAULT_RUNNER_LABELS } from "@runnerctl/core/lib/config/defaults";
import { EXIT_CODES, ValidationError } from "@runnerctl/core/lib/errors";
import { loadBaseContext, openRunnerContext } from "../../lib/context.js";
import { renderInstanceDetail, renderInstances, renderReconcile } from "../../lib/render.js";
import { jsonArg, parseOptionalMs, printJson, stateArgs } from "../common.js";
import { loadRepositoryToken, promptTokenSource } from "./tokens.js";

const nameArg = { type: "positional", description: "Runner name.", required: true } as const;

async function open(args: { home?: string; "log-level"?: string }) {
  return await openRunnerContext(await loadBaseContext({ home: args.home, logLevel: args["log-level"] }));
}

export const runnerAdd = defineCommand({
  meta: { name: "add", description: "Track a new runner instance locally (no GitHub call)." },
  args: {
    ...stateArgs,
    name: nameArg,
    repo: { type: "string", description: "Repository as owner/repo.", required: true },
    labels: { type: "string", description: "Comma-separated labels (default: self-hosted)." },
    ephemeral: { type: "boolean", description: "Take one job, then deregister.", default: false },
  },
  async run({ args }) {
    const ctx = await open(args);
    const labels = splitCsv(args.labels);
    const instance = await ctx.registry.register({
      name: coerceTrimmedString(args.name),
      repository: coerceTrimmedString(args.repo),
      labels: labels.length > 0 ? labels : [...DEFAULT_RUNNER_LABELS],
      ephemeral: args.ephemeral,
    });
    console.log(`ok: added ${instance.name} for ${instance.repository} (labels: ${instance.labels.join(",")})`);
  },
});

export const runnerRegister = defineCommand({
  meta: { name: "register", description: "Register a runner with GitHub using the stored token." },
  args: {
    ...stateArgs,
    name: nameArg,
  },
  async run({ args }) {
    const ctx = await open(args);
    const name = coerceTrimmedString(args.name);
    const token = await loadRepositoryToken(ctx, ctx.registry.require(name).repository);
    const instance = await ctx.controller.register(name, token);
    console.log(`ok: registered ${name} (remote id ${instance.remoteId ?? "unknown"})`);
  },
});

export const runnerStop = defineCommand({
  meta: { name: "stop", description: "Stop a running runner: SIGTERM, then SIGKILL after the grace period." },
  args: {
    ...stateArgs,
    name: { type: "positional", description: "Runner name (omit with --all).", required: false },
    all: { type: "boolean", description: "Stop every runner with a live process on this host.", default: false },
    force: { type: "boolean", description: "Send SIGKILL right away.", default: false },
    "grace-period": { type: "string", description: "Grace period ms (default: config worker.gracePeriodMs)." },
  },
  async run({ args }) {
    const name = coerceTrimmedString(args.name);
    if (!args.all && !name) throw new ValidationError("runner name required (or pass --all)");
    if (args.all && name) throw new ValidationError("pass a runner name or --all, not both", name);
    const gracePeriodMs = parseOptionalMs(args["grace-period"], "grace-period");
    const ctx = await open(args);

    if (!args.all) {
      await ctx.controller.stop(name, { graceful: !args.force, gracePeriodMs });
      console.log(`ok: ${name} stopped`);
      return;
    }

    const report = await ctx.controller.shutdown({ includeRecorded: true, graceful: !args.force, gracePeriodMs });
    if (report.stopped.length === 0 && report.failures.length === 0) {
      console.log("ok: no runners running");
      return;
    }
    for (const stopped of report.stopped) console.log(`ok: ${stopped} stopped`);
    for (const failure of report.failures) {
      const reason = failure.error instanceof Error ? failure.error.message : String(failure.error);
      console.error(`error: ${failure.name}: ${reason}`);
    }
    if (report.failures.length > 0) process.exitCode = EXIT_CODES.generic;
  },
});

export const runnerRemove = defineCommand({
  meta: { name: "remove", description: "Deregister a stopped runner from GitHub and clear its local registration." },
  args: {
    ...stateArgs,
    name: nameArg,
    force: { type: "boolean", description: "Mark unregistered even when the GitHub call fails.", default: false },
    forget: { type: "boolean", description: "Also drop the runner from the local registry.", default: false },
  },
  async run({ args }) {
    const ctx = await open(args);
    const name = coerceTrimmedString(args.name);
    const instance = ctx.registry.require(name);
    if (instance.registrationState !== "unregistered") {
      const token = await loadRepositoryToken(ctx, instance.repository);
      const removed = await ctx.controller.remove(name, token, { force: args.force });
      for (const warning of removed.warnings) console.error(`warn: ${warning}`);
      console.log(`ok: ${name} deregistered`);
    }
    if (args.forget) {
      await ctx.registry.remove(name);
      console.log(`ok: ${name} forgotten`);
    }
  },
});

export const runnerList = defineCommand({
  meta: { name: "list", description: "List tracked runners." },
  args: {
    ...stateArgs,
    ...jsonArg,
  },
  async run({ args }) {
    const ctx = await open(args);
    const instances = ctx.registry.list();
    if (args.json) {
      printJson({ runners: instances });
      return;
    }
    console.log(renderInstances(instances));
  },
});

export const runnerShow = defineCommand({
  meta: { name: "show", description: "Show one runner's registry entry." },
  args: {
    ...stateArgs,
    ...jsonArg,
    name: nameArg,
  },
  async run({ args }) {
    const ctx = await open(args);
    const instance = ctx.registry.require(coerceTrimmedString(args.name));
    if (args.json) {
      printJson(instance);
      return;
    }
    console.log(renderInstanceDetail(instance));
  },
});

export const runnerReconcile = defineCommand({
  meta: { name: "reconcile", description: "Align the registry with live processes and the runner list on GitHub." },
  args: {
    ...stateArgs,
    ...jsonArg,
    offline: { type: "boolean", description: "Only check local processes (no password, no GitHub call).", default: false },
  },
  async run({ args }) {
    const ctx = await open(args);
    const tokens = args.offline ? undefined : await promptTokenSource(ctx);
    const entries = await ctx.controller.reconcile(tokens);
    if (args.json) {
      printJson({ runners: entries });
      return;
    }
    console.log(renderReconcile(entries));
  },
});
