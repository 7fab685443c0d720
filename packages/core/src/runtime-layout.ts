import os from "node:os";
import path from "node:path";
import process from "node:process";

export type RuntimeLayout = {
  // ~/.runnerctl unless RUNNERCTL_HOME is set.
  homeDir: string;
  configPath: string;

  // Owner-only; holds the encrypted token records and the password verifier.
  vaultDir: string;
  vaultRecordsPath: string;
  vaultVerifierPath: string;

  registryPath: string;

  // One runner agent directory per instance lives below this.
  runnersDir: string;
  logsDir: string;
};

export function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = String(env["RUNNERCTL_HOME"] ?? "").trim();
  if (explicit) return path.resolve(explicit);
  return path.join(os.homedir(), ".runnerctl");
}

export function getRuntimeLayout(homeDir: string = resolveHomeDir()): RuntimeLayout {
  const vaultDir = path.join(homeDir, "vault");
  return {
    homeDir,
    configPath: path.join(homeDir, "config.json"),
    vaultDir,
    vaultRecordsPath: path.join(vaultDir, "tokens.json"),
    vaultVerifierPath: path.join(vaultDir, "verifier.json"),
    registryPath: path.join(homeDir, "runners.json"),
    runnersDir: path.join(homeDir, "runners"),
    logsDir: path.join(homeDir, "logs"),
  };
}

export function getRunnerDir(layout: RuntimeLayout, runnersDir: string | undefined, name: string): string {
  return path.join(runnersDir?.trim() ? runnersDir : layout.runnersDir, name);
}
