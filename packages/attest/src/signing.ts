import crypto, { type KeyObject } from "node:crypto";

export type SignerIdentity = {
  alg: "ed25519";
  public_key: string; // raw 32-byte key, lowercase hex
  address: string; // "ws1" + first 20 bytes of sha256(raw key), hex
};

// --------------------
// DER wrappers for raw Ed25519 keys (RFC 8410)
// --------------------
const ED25519_PKCS8_PREFIX = Buffer.from("302e020100300506032b657004220420", "hex");
const ED25519_SPKI_PREFIX = Buffer.from("302a300506032b6570032100", "hex");

export const ED25519_PUBLIC_KEY_HEX = /^[0-9a-f]{64}$/;
// 64-byte signature, canonical padded base64
export const ED25519_SIGNATURE_B64 = /^[A-Za-z0-9+/]{86}==$/;
export const ADDRESS_PREFIX = "ws1";
export const SIGNER_ADDRESS = /^ws1[0-9a-f]{40}$/;

const KEY_SALT = "waterseal/signing-key";
const KEY_INFO = "ed25519/v1";

/**
 * 32-byte Ed25519 seed from a configured secret (HKDF-SHA256).
 * importEd25519Seed() zeroes it once the key is imported.
 */
export function deriveSeed(secret: string): Buffer {
  return Buffer.from(crypto.hkdfSync("sha256", Buffer.from(secret, "utf8"), KEY_SALT, KEY_INFO, 32));
}

/** Imports a raw seed as a private key, then zero-fills the seed and DER copies. */
export function importEd25519Seed(seed: Buffer): KeyObject {
  const der = Buffer.concat([ED25519_PKCS8_PREFIX, seed]);
  try {
    return crypto.createPrivateKey({ key: der, format: "der", type: "pkcs8" });
  } finally {
    der.fill(0);
    seed.fill(0);
  }
}

export function rawPublicKey(key: KeyObject): Buffer {
  const spki = crypto.createPublicKey(key).export({ format: "der", type: "spki" });
  return spki.subarray(ED25519_SPKI_PREFIX.length);
}

/**
 * Short signer handle for allowlists and logs. Not an account address on any
 * chain: the prefix keeps it from being read as one.
 */
export function addressFromPublicKey(raw: Uint8Array): string {
  return ADDRESS_PREFIX + crypto.createHash("sha256").update(raw).digest().subarray(0, 20).toString("hex");
}

export function identityFromKey(key: KeyObject): SignerIdentity {
  const raw = rawPublicKey(key);
  return {
    alg: "ed25519",
    public_key: raw.toString("hex"),
    address: addressFromPublicKey(raw),
  };
}

function publicKeyFromHex(hex: string): KeyObject {
  return crypto.createPublicKey({
    key: Buffer.concat([ED25519_SPKI_PREFIX, Buffer.from(hex, "hex")]),
    format: "der",
    type: "spki",
  });
}

/**
 * Checks an Ed25519 signature over exact bytes. Never throws: any malformed
 * key or signature is a plain `false`.
 */
export function verifyEd25519(bytes: Uint8Array, signatureB64: string, publicKeyHex: string): boolean {
  if (!ED25519_PUBLIC_KEY_HEX.test(publicKeyHex)) return false;
  if (!ED25519_SIGNATURE_B64.test(signatureB64)) return false;

  // Only the canonical base64 spelling of a signature is accepted
  const sig = Buffer.from(signatureB64, "base64");
  if (sig.toString("base64") !== signatureB64) return false;

  try {
    return crypto.verify(null, bytes, publicKeyFromHex(publicKeyHex), sig);
  } catch {
    return false;
  }
}
