import { pluralize } from "@runnerctl/shared/lib/strings";
import type { HealthReport } from "@runnerctl/core/lib/health/monitor";
import type { ReconcileEntry } from "@runnerctl/core/lib/runners/lifecycle";
import type { RunnerInstance } from "@runnerctl/core/lib/runners/types";
import type { VaultStatus } from "@runnerctl/core/lib/vault/credential-store";

function table(rows: string[][]): string {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, idx) => {
      widths[idx] = Math.max(widths[idx] ?? 0, cell.length);
    });
  }
  return rows
    .map((row) =>
      row
        .map((cell, idx) => (idx === row.length - 1 ? cell : cell.padEnd(widths[idx] ?? 0)))
        .join("  ")
        .trimEnd(),
    )
    .join("\n");
}

export function renderInstances(instances: readonly RunnerInstance[]): string {
  if (instances.length === 0) return "no runners (add one with: runnerctl runner add <name> --repo <owner/repo>)";
  const rows = [["NAME", "REPOSITORY", "STATE", "PID", "HEALTH", "LABELS"]];
  for (const i of instances) {
    rows.push([
      i.name,
      i.repository,
      i.registrationState,
      i.pid === null ? "-" : String(i.pid),
      i.lastHealth?.verdict ?? "-",
      i.labels.join(","),
    ]);
  }
  return table(rows);
}

export function renderInstanceDetail(instance: RunnerInstance): string {
  const lines = [
    `name:       ${instance.name}`,
    `repository: ${instance.repository}`,
    `state:      ${instance.registrationState}`,
    `remote id:  ${instance.remoteId ?? "-"}`,
    `pid:        ${instance.pid ?? "-"}`,
    `labels:     ${instance.labels.join(",") || "-"}`,
    `ephemeral:  ${instance.ephemeral ? "yes" : "no"}`,
  ];
  for (const warning of instance.warnings) lines.push(`warning:    ${warning}`);
  return lines.join("\n");
}

export function renderHealth(report: HealthReport): string {
  const lines = [`${report.name}: ${report.health.verdict}`];
  for (const f of report.health.findings) {
    lines.push(`  [${f.severity}] ${f.check}: ${f.message}`);
  }
  return lines.join("\n");
}

export function renderReconcile(entries: readonly ReconcileEntry[]): string {
  if (entries.length === 0) return "no runners";
  return entries
    .map((entry) => (entry.actions.length === 0 ? `${entry.name}: in sync` : [`${entry.name}:`, ...entry.actions.map((a) => `  - ${a}`)].join("\n")))
    .join("\n");
}

export function renderVaultStatus(status: VaultStatus): string {
  if (!status.exists) return "vault: empty (save a token with: runnerctl credentials save <owner/repo>)";
  const lines = [`vault: ${pluralize(status.recordCount, "record")}, verifier ${status.hasVerifier ? "present" : "missing"}`];
  for (const warning of status.warnings) lines.push(`warning: ${warning}`);
  return lines.join("\n");
}
