import type { ArgsDef } from "citty";
import { ValidationError } from "@runnerctl/core/lib/errors";

// Accepted by every command that touches the state directory.
export const stateArgs = {
  home: { type: "string", description: "State directory (default: $RUNNERCTL_HOME or ~/.runnerctl)." },
  "log-level": { type: "string", description: "Log level: fatal|error|warn|info|debug|trace (default: config logging.level)." },
} as const satisfies ArgsDef;

export const jsonArg = {
  json: { type: "boolean", description: "Output JSON.", default: false },
} as const satisfies ArgsDef;

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function parseOptionalMs(raw: unknown, flag: string): number | undefined {
  const s = String(raw ?? "").trim();
  if (!s) return undefined;
  const n = Number(s);
  if (!Number.isInteger(n) || n <= 0) throw new ValidationError(`invalid --${flag}: ${s} (expected milliseconds > 0)`);
  return n;
}
