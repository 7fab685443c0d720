import process from "node:process";
import { defineCommand } from "citty";
import { coerceTrimmedString } from "@runnerctl/shared/lib/strings";
import { EXIT_CODES } from "@runnerctl/core/lib/errors";
import type { HealthReport } from "@runnerctl/core/lib/health/monitor";
import { createHealthMonitor, loadBaseContext, openRunnerContext } from "../../lib/context.js";
import { renderHealth } from "../../lib/render.js";
import { jsonArg, parseOptionalMs, printJson, stateArgs } from "../common.js";
import { promptTokenSource } from "./tokens.js";

function printReports(reports: readonly HealthReport[], json: boolean): void {
  if (json) {
    printJson({ runners: reports });
    return;
  }
  console.log(reports.length === 0 ? "no runners" : reports.map(renderHealth).join("\n"));
}

export const runnerStatus = defineCommand({
  meta: { name: "status", description: "Run health checks and record the verdicts on the registry." },
  args: {
    ...stateArgs,
    ...jsonArg,
    name: { type: "positional", description: "Runner name (default: all).", required: false },
    "with-token": { type: "boolean", description: "Also check the stored token against GitHub (asks for the vault password).", default: false },
    watch: { type: "boolean", description: "Repeat until interrupted.", default: false },
    interval: { type: "string", description: "Watch interval ms (default: config health.intervalMs)." },
  },
  async run({ args }) {
    const ctx = await openRunnerContext(await loadBaseContext({ home: args.home, logLevel: args["log-level"] }));
    const tokenFor = args["with-token"] ? await promptTokenSource(ctx) : undefined;
    const monitor = createHealthMonitor(ctx, tokenFor);

    if (args.watch) {
      const stopping = new AbortController();
      const stop = () => stopping.abort();
      process.on("SIGINT", stop);
      process.on("SIGTERM", stop);
      try {
        await monitor.watch({
          intervalMs: parseOptionalMs(args.interval, "interval") ?? ctx.config.health.intervalMs,
          signal: stopping.signal,
          onReport: (reports) => printReports(reports, args.json),
        });
      } finally {
        process.off("SIGINT", stop);
        process.off("SIGTERM", stop);
      }
      return;
    }

    const name = coerceTrimmedString(args.name);
    const reports = name ? [{ name, health: await monitor.checkInstance(name) }] : await monitor.checkAll();
    printReports(reports, args.json);
    if (reports.some((r) => r.health.verdict === "unhealthy")) process.exitCode = EXIT_CODES.generic;
  },
});
