import { createHash } from "node:crypto";

/**
 * JSON serialization with object keys sorted at every level, so equal
 * values always produce equal text regardless of property insertion order.
 */
export function stableStringify(value: unknown): string {
  // JSON.stringify(undefined) yields undefined at runtime
  return JSON.stringify(normalize(value)) ?? "null";
}

function normalize(value: unknown): unknown {
  if (value === null || typeof value !== "object") return value;
  if (Array.isArray(value)) return value.map(normalize);
  const out: Record<string, unknown> = {};
  const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  for (const [key, v] of entries) {
    if (v !== undefined) out[key] = normalize(v);
  }
  return out;
}

export function hashValue(value: unknown): string {
  return createHash("sha256").update(stableStringify(value)).digest("hex");
}
