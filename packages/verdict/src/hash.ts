import { createHash } from "node:crypto";

/**
 * JSON text for hashing water samples into a subject (`sha256:<hex>`) when the
 * sample carries no id. Keys are ordered by UTF-16 code unit, undefined fields
 * are dropped and arrays keep their order, so two parses of the same sample
 * give the same text whatever order the request listed its readings in.
 *
 * Decision records never go through here; they are signed over the binary
 * encoding in canonicalize.ts.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(ordered(value));
}

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function ordered(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(ordered);
  if (value === null || typeof value !== "object") return value;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value).sort(byKey)) {
    if (v !== undefined) out[k] = ordered(v);
  }
  return out;
}

export function sha256Hex(input: string | Uint8Array): string {
  return createHash("sha256").update(input).digest("hex");
}
