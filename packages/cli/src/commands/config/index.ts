import { defineCommand } from "citty";
import { ConflictError } from "@runnerctl/core/lib/errors";
import { defaultRunnerctlConfig } from "@runnerctl/core/lib/config/schema";
import { writeRunnerctlConfig } from "@runnerctl/core/lib/config/io";
import { loadBaseContext } from "../../lib/context.js";
import { stateArgs } from "../common.js";

const init = defineCommand({
  meta: { name: "init", description: "Write <home>/config.json with every default filled in." },
  args: {
    ...stateArgs,
    force: { type: "boolean", description: "Overwrite an existing config.json.", default: false },
    "dry-run": { type: "boolean", description: "Print the planned write without writing.", default: false },
  },
  async run({ args }) {
    const ctx = await loadBaseContext({ home: args.home, logLevel: args["log-level"] });
    const configPath = ctx.layout.configPath;
    if (ctx.configExists && !args.force) {
      throw new ConflictError(configPath, `config already exists: ${configPath}`, "pass --force to overwrite");
    }
    if (args["dry-run"]) {
      console.log(`planned: write ${configPath}`);
      return;
    }
    await writeRunnerctlConfig(configPath, defaultRunnerctlConfig());
    console.log(`ok: wrote ${configPath}`);
  },
});

const show = defineCommand({
  meta: { name: "show", description: "Print the effective config (file merged over defaults)." },
  args: {
    ...stateArgs,
    pretty: { type: "boolean", description: "Pretty-print JSON.", default: true },
  },
  async run({ args }) {
    const ctx = await loadBaseContext({ home: args.home, logLevel: args["log-level"] });
    console.log(args.pretty ? JSON.stringify(ctx.config, null, 2) : JSON.stringify(ctx.config));
  },
});

const path = defineCommand({
  meta: { name: "path", description: "Print the state directory layout." },
  args: {
    ...stateArgs,
  },
  async run({ args }) {
    const ctx = await loadBaseContext({ home: args.home, logLevel: args["log-level"] });
    const { layout } = ctx;
    console.log(
      [
        `home:     ${layout.homeDir}`,
        `config:   ${layout.configPath}${ctx.configExists ? "" : " (missing; defaults in use)"}`,
        `vault:    ${layout.vaultDir}`,
        `registry: ${layout.registryPath}`,
        `runners:  ${ctx.config.worker.runnersDir || layout.runnersDir}`,
        `logs:     ${layout.logsDir}`,
      ].join("\n"),
    );
  },
});

export const config = defineCommand({
  meta: {
    name: "config",
    description: "Inspect or create config.json.",
  },
  subCommands: {
    init,
    show,
    path,
  },
});
