import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ValidationError } from "../src/lib/errors";
import { loadRunnerctlConfig, parseRunnerctlConfig, writeRunnerctlConfig } from "../src/lib/config/io";
import { defaultRunnerctlConfig } from "../src/lib/config/schema";
import { getRunnerDir, getRuntimeLayout, resolveHomeDir } from "../src/runtime-layout";

describe("config io", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "runnerctl-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("fills every section with defaults", () => {
    const config = defaultRunnerctlConfig();
    expect(config.github).toEqual({ apiUrl: "https://api.github.com", webUrl: "https://github.com", requestTimeoutMs: 10_000 });
    expect(config.worker.gracePeriodMs).toBe(30_000);
    expect(config.worker.handshakePattern).toBe("Listening for Jobs|Connected to GitHub");
    expect(config.health.disk).toEqual({ softPercent: 80, hardPercent: 90 });
    expect(config.health.memory).toEqual({ softPercent: 80, hardPercent: 95 });
    expect(config.health.load.softPerCore).toBe(2);
    expect(config.logging.level).toBe("info");
  });

  it("normalizes URLs and rejects bad values", () => {
    expect(parseRunnerctlConfig({ github: { apiUrl: "https://ghe.example.test/api/v3/" } }).github.apiUrl).toBe(
      "https://ghe.example.test/api/v3",
    );
    expect(() => parseRunnerctlConfig({ worker: { handshakePattern: "(" } })).toThrow(ValidationError);
    expect(() => parseRunnerctlConfig({ health: { disk: { softPercent: 95, hardPercent: 90 } } })).toThrow(
      /softPercent must not exceed hardPercent/,
    );
  });

  it("returns defaults when the file is missing and round-trips writes", async () => {
    const configPath = path.join(dir, "config.json");
    const missing = await loadRunnerctlConfig(configPath);
    expect(missing.exists).toBe(false);
    expect(missing.config).toEqual(defaultRunnerctlConfig());

    const config = defaultRunnerctlConfig();
    config.worker.startTimeoutMs = 5_000;
    await writeRunnerctlConfig(configPath, config);
    const loaded = await loadRunnerctlConfig(configPath);
    expect(loaded.exists).toBe(true);
    expect(loaded.config.worker.startTimeoutMs).toBe(5_000);
  });

  it("reports invalid JSON", async () => {
    const configPath = path.join(dir, "config.json");
    await writeFile(configPath, "{", "utf8");
    await expect(loadRunnerctlConfig(configPath)).rejects.toThrow(`invalid JSON: ${configPath}`);
  });
});

describe("runtime layout", () => {
  it("honors RUNNERCTL_HOME", () => {
    expect(resolveHomeDir({ RUNNERCTL_HOME: "/srv/runnerctl" })).toBe("/srv/runnerctl");
    expect(resolveHomeDir({})).toMatch(/\.runnerctl$/);
  });

  it("places the vault, registry and runners under home", () => {
    const layout = getRuntimeLayout("/srv/runnerctl");
    expect(layout).toMatchObject({
      configPath: "/srv/runnerctl/config.json",
      vaultRecordsPath: "/srv/runnerctl/vault/tokens.json",
      vaultVerifierPath: "/srv/runnerctl/vault/verifier.json",
      registryPath: "/srv/runnerctl/runners.json",
    });
    expect(getRunnerDir(layout, "", "runner-1")).toBe("/srv/runnerctl/runners/runner-1");
    expect(getRunnerDir(layout, "/opt/runners", "runner-1")).toBe("/opt/runners/runner-1");
  });
});
