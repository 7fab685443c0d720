import { defineCommand } from "citty";
import { coerceTrimmedString } from "@runnerctl/shared/lib/strings";
import { maskToken } from "@runnerctl/shared/lib/token-patterns";
import { ValidationError } from "@runnerctl/core/lib/errors";
import { createCredentialStore, loadBaseContext } from "../../lib/context.js";
import { confirmAction, NEW_PASSWORD_ENV, readSecret, readVaultPassword, TOKEN_ENV } from "../../lib/prompt.js";
import { renderVaultStatus } from "../../lib/render.js";
import { jsonArg, printJson, stateArgs } from "../common.js";

const repositoryArg = {
  type: "positional",
  description: "Repository as owner/repo.",
  required: true,
} as const;

const save = defineCommand({
  meta: { name: "save", description: `Encrypt and store a GitHub token (read from $${TOKEN_ENV} or a prompt).` },
  args: {
    ...stateArgs,
    repository: repositoryArg,
  },
  async run({ args }) {
    const ctx = await loadBaseContext({ home: args.home, logLevel: args["log-level"] });
    const store = createCredentialStore(ctx);
    const repository = coerceTrimmedString(args.repository);
    const token = (await readSecret({ label: "GitHub token", envVar: TOKEN_ENV })).trim();
    const status = await store.status();
    const password = await readVaultPassword({ confirm: !status.hasVerifier });
    await store.save(repository, token, password);
    console.log(`ok: saved ${maskToken(token)} for ${repository}`);
  },
});

const load = defineCommand({
  meta: { name: "load", description: "Decrypt a stored token and print it on stdout." },
  args: {
    ...stateArgs,
    repository: repositoryArg,
    masked: { type: "boolean", description: "Print only a masked form.", default: false },
  },
  async run({ args }) {
    const ctx = await loadBaseContext({ home: args.home, logLevel: args["log-level"] });
    const store = createCredentialStore(ctx);
    const password = await readVaultPassword();
    const token = await store.load(coerceTrimmedString(args.repository), password);
    console.log(args.masked ? maskToken(token) : token);
  },
});

const list = defineCommand({
  meta: { name: "list", description: "List repositories with a stored token." },
  args: {
    ...stateArgs,
    ...jsonArg,
  },
  async run({ args }) {
    const ctx = await loadBaseContext({ home: args.home, logLevel: args["log-level"] });
    const store = createCredentialStore(ctx);
    const password = await readVaultPassword();
    const repositories = await store.list(password);
    if (args.json) {
      printJson({ repositories });
      return;
    }
    console.log(repositories.length === 0 ? "no tokens saved" : repositories.join("\n"));
  },
});

const clear = defineCommand({
  meta: { name: "clear", description: "Delete one stored token, or all of them with --all." },
  args: {
    ...stateArgs,
    repository: { type: "positional", description: "Repository as owner/repo.", required: false },
    all: { type: "boolean", description: "Delete every stored token and the password verifier.", default: false },
    yes: { type: "boolean", description: "Skip the confirmation prompt.", default: false },
  },
  async run({ args }) {
    const repository = coerceTrimmedString(args.repository);
    if (args.all && repository) throw new ValidationError("pass a repository or --all, not both");
    if (!args.all && !repository) throw new ValidationError("missing repository (or pass --all)");

    const ctx = await loadBaseContext({ home: args.home, logLevel: args["log-level"] });
    const store = createCredentialStore(ctx);
    if (args.all) {
      if (!(await confirmAction("Delete every stored token?", args.yes))) return;
      const count = await store.clearAll();
      console.log(`ok: cleared ${count} token(s)`);
      return;
    }
    await store.clearOne(repository);
    console.log(`ok: cleared ${repository}`);
  },
});

const rekey = defineCommand({
  meta: {
    name: "rekey",
    description: `Re-encrypt every token under a new password ($RUNNERCTL_PASSWORD is the old one, $${NEW_PASSWORD_ENV} the new one).`,
  },
  args: {
    ...stateArgs,
  },
  async run({ args }) {
    const ctx = await loadBaseContext({ home: args.home, logLevel: args["log-level"] });
    const store = createCredentialStore(ctx);
    const oldPassword = await readVaultPassword();
    const newPassword = await readSecret({ label: "new vault password", envVar: NEW_PASSWORD_ENV, confirm: true });
    const count = await store.rekey(oldPassword, newPassword);
    console.log(`ok: re-encrypted ${count} token(s)`);
  },
});

const status = defineCommand({
  meta: { name: "status", description: "Show vault presence and permission warnings (no password needed)." },
  args: {
    ...stateArgs,
    ...jsonArg,
  },
  async run({ args }) {
    const ctx = await loadBaseContext({ home: args.home, logLevel: args["log-level"] });
    const vault = await createCredentialStore(ctx).status();
    if (args.json) {
      printJson(vault);
      return;
    }
    console.log(renderVaultStatus(vault));
  },
});

export const credentials = defineCommand({
  meta: {
    name: "credentials",
    description: "Password-protected GitHub token vault.",
  },
  subCommands: {
    save,
    load,
    list,
    clear,
    rekey,
    status,
  },
});
