import { z } from "zod";

import { detectGithubToken } from "./token-patterns.js";

const SAFE_REPOSITORY_ID_RE = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;
const SAFE_RUNNER_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;
const SAFE_LABEL_RE = /^[A-Za-z0-9][A-Za-z0-9._:-]{0,63}$/;

function looksLikePastedToken(value: string): boolean {
  const s = value.trim();
  if (detectGithubToken(s)) return true;
  if (s.length < 40) return false;
  const hasLetter = /[A-Za-z]/.test(s);
  const hasDigit = /\d/.test(s);
  return hasLetter && hasDigit && !/[._-]/.test(s);
}

export const RepositoryIdSchema = z
  .string()
  .trim()
  .min(1)
  .refine((v) => SAFE_REPOSITORY_ID_RE.test(v), { message: "invalid repository (expected owner/repo)" })
  .refine((v) => !v.split("/").some((part) => part === "." || part === ".."), { message: "invalid repository" });

export const RunnerNameSchema = z
  .string()
  .trim()
  .min(1)
  .refine((v) => SAFE_RUNNER_NAME_RE.test(v), { message: "invalid runner name (use [A-Za-z0-9][A-Za-z0-9._-]*, max 64)" })
  .refine((v) => !looksLikePastedToken(v), { message: "invalid runner name (looks like a token)" });

export const RunnerLabelSchema = z
  .string()
  .trim()
  .min(1)
  .refine((v) => SAFE_LABEL_RE.test(v), { message: "invalid runner label (use [A-Za-z0-9][A-Za-z0-9._:-]*)" });

export type RepositoryRef = { owner: string; repo: string; id: string };

export function parseRepositoryId(raw: string): RepositoryRef {
  const id = RepositoryIdSchema.parse(raw);
  const [owner = "", repo = ""] = id.split("/");
  return { owner, repo, id };
}

export function normalizeLabels(labels: readonly string[]): string[] {
  const parsed = labels.map((label) => RunnerLabelSchema.parse(label));
  return Array.from(new Set(parsed)).sort((a, b) => a.localeCompare(b));
}
