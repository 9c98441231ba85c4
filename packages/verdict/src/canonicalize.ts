import { createHash } from "node:crypto";
import { SCORE_DECIMALS, type DecisionRecord, type RiskFinding, type Verdict } from "./schema.js";

/**
 * Type-tagged, length-prefixed encoding of a DecisionRecord.
 *
 *   tag 0x01 string  u32 byte length + UTF-8
 *   tag 0x02 int64   8 bytes, big-endian two's complement
 *   tag 0x03 bool    0x00 | 0x01
 *   tag 0x04 fixed6  u32 = value * 10^6
 *   tag 0x05 list    u32 count + elements
 *   tag 0x06 map     u32 count + (string key, value), keys sorted by UTF-8 bytes
 *   tag 0x07 record  u32 field count + (string name, value), fixed field order
 *
 * Output = "WSDR" + string(scheme id) + record(decision).
 *
 * NOTE: the layout is frozen per scheme id. Any change (field order,
 * precision, tags) ships under a new scheme id.
 */

export const CANONICAL_MAGIC = Buffer.from("WSDR", "ascii");

const TAG = {
  STRING: 0x01,
  INT64: 0x02,
  BOOL: 0x03,
  FIXED6: 0x04,
  LIST: 0x05,
  MAP: 0x06,
  RECORD: 0x07,
} as const;

type Field = [name: string, write: (w: CanonicalWriter) => void];

export class CanonicalWriter {
  private chunks: Buffer[] = [];

  raw(b: Buffer): this {
    this.chunks.push(b);
    return this;
  }

  private tag(t: number): void {
    this.chunks.push(Buffer.of(t));
  }

  private u32(n: number): void {
    const b = Buffer.alloc(4);
    b.writeUInt32BE(n);
    this.chunks.push(b);
  }

  string(s: string): this {
    const bytes = Buffer.from(s, "utf8");
    this.tag(TAG.STRING);
    this.u32(bytes.length);
    this.chunks.push(bytes);
    return this;
  }

  int64(n: number): this {
    const b = Buffer.alloc(8);
    b.writeBigInt64BE(BigInt(n));
    this.tag(TAG.INT64);
    this.chunks.push(b);
    return this;
  }

  bool(v: boolean): this {
    this.tag(TAG.BOOL);
    this.chunks.push(Buffer.of(v ? 1 : 0));
    return this;
  }

  // Decimal digits, not float math: "0.800000" -> 800000 on every platform.
  fixed6(v: number): this {
    const units = Number(v.toFixed(SCORE_DECIMALS).replace(".", ""));
    this.tag(TAG.FIXED6);
    this.u32(units);
    return this;
  }

  list<T>(items: readonly T[], each: (w: this, item: T) => void): this {
    this.tag(TAG.LIST);
    this.u32(items.length);
    for (const item of items) each(this, item);
    return this;
  }

  map<V>(entries: Readonly<Record<string, V>>, each: (w: this, value: V) => void): this {
    const keys = Object.keys(entries).sort(compareUtf8);
    this.tag(TAG.MAP);
    this.u32(keys.length);
    for (const k of keys) {
      this.string(k);
      each(this, entries[k]);
    }
    return this;
  }

  record(fields: Field[]): this {
    this.tag(TAG.RECORD);
    this.u32(fields.length);
    for (const [name, write] of fields) {
      this.string(name);
      write(this);
    }
    return this;
  }

  toBytes(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

export function compareUtf8(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
}

function writeRisk(w: CanonicalWriter, r: RiskFinding): void {
  w.record([
    ["category", (x) => x.string(r.category)],
    ["severity", (x) => x.string(r.severity)],
    ["explanation", (x) => x.string(r.explanation)],
  ]);
}

function writeVerdict(w: CanonicalWriter, v: Verdict): void {
  w.record([
    ["score", (x) => x.fixed6(v.score)],
    ["flags", (x) => x.map(v.flags, (y, flag) => y.bool(flag))],
    ["risks", (x) => x.list(v.risks, writeRisk)],
    ["remediation", (x) => x.list(v.remediation, (y, step) => y.string(step))],
  ]);
}

/**
 * Encode a validated decision under the given scheme id. The scheme id is
 * written into the bytes so a signature can never be replayed across schemes.
 */
export function encodeDecisionTlv(decision: DecisionRecord, schemeId: string): Buffer {
  return new CanonicalWriter()
    .raw(CANONICAL_MAGIC)
    .string(schemeId)
    .record([
      ["subject", (x) => x.string(decision.subject)],
      ["verdict", (x) => writeVerdict(x, decision.verdict)],
      ["produced_at", (x) => x.int64(decision.produced_at)],
    ])
    .toBytes();
}

export function canonicalDigest(bytes: Uint8Array): string {
  return createHash("sha256").update(bytes).digest("hex");
}
