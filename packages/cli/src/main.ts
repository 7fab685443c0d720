#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { pathToFileURL } from "node:url";
import { defineCommand, runCommand, runMain, showUsage } from "citty";
import { EXIT_CODES, isRunnerctlError } from "@runnerctl/core/lib/errors";
import { redactKnownSecretsText } from "@runnerctl/core/lib/runtime/redaction";
import { baseCommands } from "./commands/registry.js";
import { readCliVersion } from "./lib/version.js";

export const main = defineCommand({
  meta: {
    name: "runnerctl",
    description: "Self-hosted GitHub Actions runners: token vault, lifecycle and health (state in $RUNNERCTL_HOME or ~/.runnerctl).",
  },
  subCommands: baseCommands,
});

/**
 * Prints an error the way every command reports failures and returns the
 * exit code it maps to.
 */
export function reportError(err: unknown, env: NodeJS.ProcessEnv = process.env): number {
  let exitCode: number = EXIT_CODES.generic;
  if (isRunnerctlError(err)) {
    console.error(`[${err.kind}] ${redactKnownSecretsText(err.message)}`);
    if (err.remediation) console.error(`hint: ${err.remediation}`);
    if (err.remoteAmbiguous) console.error("note: GitHub may hold a partial registration; run `runnerctl runner reconcile`");
    exitCode = err.exitCode;
  } else {
    console.error(redactKnownSecretsText(err instanceof Error ? err.message : String(err)));
  }
  if (env["RUNNERCTL_DEBUG"] === "1" && err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  return exitCode;
}

export async function mainEntry(argv: string[] = process.argv.slice(2)): Promise<void> {
  const rawArgs = argv.filter((a) => a !== "--");
  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    console.log(readCliVersion());
    return;
  }
  if (rawArgs.length === 0) {
    await showUsage(main);
    return;
  }
  if (rawArgs.includes("--help") || rawArgs.includes("-h")) {
    await runMain(main, { rawArgs });
    return;
  }
  try {
    await runCommand(main, { rawArgs });
  } catch (err) {
    process.exitCode = reportError(err);
  }
}

function shouldRunMain(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  // npm installs the bin as a symlink.
  const resolved = fs.existsSync(entry) ? fs.realpathSync(entry) : path.resolve(entry);
  return pathToFileURL(resolved).href === import.meta.url;
}

if (shouldRunMain()) {
  void mainEntry().catch((err: unknown) => {
    process.exitCode = reportError(err);
  });
}
