import crypto, { type KeyObject } from "node:crypto";
import { KeyUnavailableError } from "./errors.js";
import { deriveSeed, identityFromKey, importEd25519Seed, type SignerIdentity } from "./signing.js";

export type { SignerIdentity } from "./signing.js";

/**
 * Narrow signing capability. Raw key material never leaves an implementation.
 */
export interface KeyManager {
  publicIdentity(): SignerIdentity;
  sign(bytes: Uint8Array): Promise<string>; // base64 signature
}

function assertNonEmptyBytes(bytes: Uint8Array): Uint8Array {
  if (!(bytes instanceof Uint8Array) || bytes.length === 0) {
    throw new Error("bytes must be a non-empty byte string");
  }
  return bytes;
}

/**
 * Process-lifetime Ed25519 key, derived once from a configured secret.
 * - init() runs exactly once; there is no re-derivation or rotation
 * - destroy() drops the key; every later call fails with KeyUnavailableError
 *
 * Ed25519 signing is deterministic, so concurrent sign() calls share no
 * randomness and need no locking.
 */
export class LocalKeyManager implements KeyManager {
  private key: KeyObject | null = null;
  private identity: SignerIdentity | null = null;
  private state: "NEW" | "READY" | "DESTROYED" = "NEW";

  static fromSecret(secret: string): LocalKeyManager {
    const km = new LocalKeyManager();
    km.init(secret);
    return km;
  }

  /** Random key; for tests and throwaway demos only. */
  static ephemeral(): LocalKeyManager {
    return LocalKeyManager.fromSecret(crypto.randomBytes(32).toString("hex"));
  }

  init(secret: string): void {
    if (this.state !== "NEW") {
      throw new Error(`Key manager already ${this.state === "READY" ? "initialized" : "destroyed"}`);
    }
    if (typeof secret !== "string" || secret.trim().length === 0) {
      throw new KeyUnavailableError("Signing secret is empty");
    }

    const key = importEd25519Seed(deriveSeed(secret));
    this.key = key;
    this.identity = identityFromKey(key);
    this.state = "READY";
  }

  get ready(): boolean {
    return this.state === "READY";
  }

  publicIdentity(): SignerIdentity {
    if (!this.identity || this.state !== "READY") {
      throw new KeyUnavailableError("Signing key is not initialized");
    }
    return { ...this.identity };
  }

  async sign(bytes: Uint8Array): Promise<string> {
    const key = this.key;
    if (!key || this.state !== "READY") {
      throw new KeyUnavailableError("Signing key is not initialized");
    }
    return crypto.sign(null, assertNonEmptyBytes(bytes), key).toString("base64");
  }

  destroy(): void {
    // KeyObject memory is owned by the runtime; dropping the reference is all we can do
    this.key = null;
    this.state = "DESTROYED";
  }
}

/**
 * Bound a possibly-suspending key manager (remote signer, HSM, ...).
 * A sign() that does not settle within `timeoutMs` fails with KeyUnavailableError;
 * a sign() that throws synchronously fails with that error, unchanged.
 */
export function withSignTimeout(inner: KeyManager, timeoutMs: number): KeyManager {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error("timeoutMs must be a positive number");
  }

  return {
    publicIdentity: () => inner.publicIdentity(),
    sign(bytes: Uint8Array): Promise<string> {
      let pending: Promise<string>;
      try {
        pending = inner.sign(bytes);
      } catch (e) {
        // no timer armed yet, so nothing is left to reject later
        return Promise.reject(e);
      }

      let timer: NodeJS.Timeout | undefined;
      const expiry = new Promise<never>((_, reject) => {
        timer = setTimeout(
          () => reject(new KeyUnavailableError(`Signing did not complete within ${timeoutMs}ms`)),
          timeoutMs
        );
      });
      return Promise.race([pending, expiry]).finally(() => clearTimeout(timer));
    },
  };
}
