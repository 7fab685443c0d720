import { ZodError } from "zod";
import { ValidationError } from "../errors.js";
import { readTextIfExists, writeJsonFileAtomic } from "../storage/fs-safe.js";
import { RunnerctlConfigSchema, defaultRunnerctlConfig, type RunnerctlConfig } from "./schema.js";

function formatZodIssues(err: ZodError): string {
  return err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function parseRunnerctlConfig(raw: unknown, source = "config"): RunnerctlConfig {
  try {
    return RunnerctlConfigSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) throw new ValidationError(`invalid ${source}: ${formatZodIssues(err)}`, source);
    throw err;
  }
}

export async function loadRunnerctlConfig(configPath: string): Promise<{ config: RunnerctlConfig; exists: boolean }> {
  const text = await readTextIfExists(configPath);
  if (text === null) return { config: defaultRunnerctlConfig(), exists: false };
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ValidationError(`invalid JSON: ${configPath}`, configPath);
  }
  return { config: parseRunnerctlConfig(raw, configPath), exists: true };
}

export async function writeRunnerctlConfig(configPath: string, config: RunnerctlConfig): Promise<void> {
  const validated = parseRunnerctlConfig(config, configPath);
  await writeJsonFileAtomic(configPath, validated, { mode: 0o600 });
}
