import process from "node:process";
import * as p from "@clack/prompts";
import { ValidationError } from "@runnerctl/core/lib/errors";

export const PASSWORD_ENV = "RUNNERCTL_PASSWORD";
export const NEW_PASSWORD_ENV = "RUNNERCTL_NEW_PASSWORD";
export const TOKEN_ENV = "RUNNERCTL_TOKEN";

function hasTty(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

/**
 * Reads a secret from `envVar`, falling back to a masked prompt on a TTY.
 * Secrets are never taken from argv, where other users could read them.
 */
export async function readSecret(params: { label: string; envVar: string; confirm?: boolean }): Promise<string> {
  const fromEnv = process.env[params.envVar];
  if (fromEnv) return fromEnv;
  if (!hasTty()) throw new ValidationError(`no TTY to prompt for the ${params.label}; set ${params.envVar}`);

  const value = await p.password({
    message: params.label.charAt(0).toUpperCase() + params.label.slice(1),
    validate: (v) => (v ? undefined : "required"),
  });
  if (p.isCancel(value)) {
    p.cancel("canceled");
    throw new Error("canceled");
  }
  if (params.confirm) {
    const again = await p.password({ message: `Repeat the ${params.label}` });
    if (p.isCancel(again)) {
      p.cancel("canceled");
      throw new Error("canceled");
    }
    if (again !== value) throw new ValidationError(`${params.label} entries did not match`);
  }
  return value;
}

export async function readVaultPassword(opts: { confirm?: boolean } = {}): Promise<string> {
  return await readSecret({ label: "vault password", envVar: PASSWORD_ENV, confirm: opts.confirm });
}

export async function confirmAction(message: string, assumeYes: boolean): Promise<boolean> {
  if (assumeYes) return true;
  if (!hasTty()) throw new ValidationError(`refusing without confirmation: ${message} (pass --yes)`);
  const ok = await p.confirm({ message, initialValue: false });
  if (p.isCancel(ok)) {
    p.cancel("canceled");
    return false;
  }
  return ok;
}
