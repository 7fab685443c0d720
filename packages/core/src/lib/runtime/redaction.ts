const URL_CREDENTIALS_RE = /(https?:\/\/)([^/\s@]+@)/g;
const AUTH_BEARER_RE = /(Authorization:\s*(?:Bearer|token)\s+)([^\s]+)/gi;
const AUTH_BASIC_RE = /(Authorization:\s*Basic\s+)([^\s]+)/gi;
const TOKEN_FLAG_RE = /(--token[=\s]+)([^\s]+)/gi;
const KEY_VALUE_SECRET_RE =
  /\b((?:access|refresh|registration|remove)?_?token|api_key|apikey|secret|password)\b(\s*[:=]\s*)([^\s&]+)/gi;
const GITHUB_TOKEN_RE = /\b(?:gh[pousr]_[A-Za-z0-9]{4,}|github_pat_[A-Za-z0-9_]{8,})\b/g;
const LONG_BASE64ISH_TOKEN_RE =
  /\b(?=[A-Za-z0-9+/_-]{40,}={0,2}\b)(?=[A-Za-z0-9+/_-]*[A-Za-z])(?=[A-Za-z0-9+/_-]*\d)[A-Za-z0-9+/_-]{40,}={0,2}\b/g;

export type RedactKnownSecretsResult = {
  text: string;
  redacted: boolean;
};

export function redactKnownSecrets(input: string): RedactKnownSecretsResult {
  let out = input;
  out = out.replace(URL_CREDENTIALS_RE, "$1<redacted>@");
  out = out.replace(AUTH_BEARER_RE, "$1<redacted>");
  out = out.replace(AUTH_BASIC_RE, "$1<redacted>");
  out = out.replace(TOKEN_FLAG_RE, "$1<redacted>");
  out = out.replace(KEY_VALUE_SECRET_RE, "$1$2<redacted>");
  out = out.replace(GITHUB_TOKEN_RE, "<redacted>");
  out = out.replace(LONG_BASE64ISH_TOKEN_RE, "<redacted>");
  return {
    text: out,
    redacted: out !== input,
  };
}

export function redactKnownSecretsText(input: string): string {
  return redactKnownSecrets(input).text;
}

// Redacts the literal values too, for output that may echo a token we handed out.
export function redactValues(input: string, secrets: readonly string[]): string {
  let out = input;
  for (const secret of secrets) {
    if (secret.length < 4) continue;
    out = out.split(secret).join("<redacted>");
  }
  return redactKnownSecretsText(out);
}
