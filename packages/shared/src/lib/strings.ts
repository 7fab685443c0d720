export function coerceString(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") return String(value);
  return "";
}

export function coerceTrimmedString(value: unknown): string {
  return coerceString(value).trim();
}

// "a, b,,c" -> ["a", "b", "c"]; accepts repeated flags too (["a,b", "c"]).
export function splitCsv(value: unknown): string[] {
  const parts = Array.isArray(value) ? value.map(coerceString) : [coerceString(value)];
  return parts
    .flatMap((part) => part.split(","))
    .map((part) => part.trim())
    .filter(Boolean);
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}
