export type TokenPattern = { label: string; regex: RegExp };

// GitHub token families; see https://github.blog/2021-04-05-behind-githubs-new-authentication-token-formats/
export const GITHUB_TOKEN_PATTERNS: TokenPattern[] = [
  { label: "github personal access token", regex: /^ghp_[A-Za-z0-9]+$/ },
  { label: "github oauth token", regex: /^gho_[A-Za-z0-9]+$/ },
  { label: "github user-to-server token", regex: /^ghu_[A-Za-z0-9]+$/ },
  { label: "github server-to-server token", regex: /^ghs_[A-Za-z0-9]+$/ },
  { label: "github refresh token", regex: /^ghr_[A-Za-z0-9]+$/ },
  { label: "github fine-grained token", regex: /^github_pat_[A-Za-z0-9_]+$/ },
];

const PRINTABLE_ASCII_RE = /^[\x21-\x7e]+$/;

export function detectGithubToken(value: string): TokenPattern | null {
  const s = String(value || "").trim();
  if (!s) return null;
  for (const p of GITHUB_TOKEN_PATTERNS) {
    if (p.regex.test(s)) return p;
  }
  return null;
}

/**
 * Shape check applied to decrypted vault payloads. Bearer tokens are single
 * printable ASCII words; anything else means the bytes did not decode to a token.
 */
export function isPlausibleTokenText(value: string): boolean {
  return value.length > 0 && value.length <= 4096 && PRINTABLE_ASCII_RE.test(value);
}

export function maskToken(value: string): string {
  const s = String(value || "").trim();
  if (!s) return "";
  const pattern = detectGithubToken(s);
  const prefix = pattern ? s.slice(0, s.indexOf("_") + 1) : "";
  const tail = s.length > prefix.length + 8 ? s.slice(-4) : "";
  return `${prefix}****${tail}`;
}
