import {
  CURRENT_SCHEME_ID,
  DEFAULT_DECISION_POLICY,
  InvalidDecisionError,
  SUPPORTED_SCHEMES,
  UnknownSchemeError,
  canonicalDigest,
  freezeDecision,
  validateDecision,
  type DecisionPolicy,
  type DecisionRecord,
  type SchemeRegistry,
} from "../../verdict/src/index.js";
import type { AttestationBundle } from "./bundle.js";
import { KeyUnavailableError } from "./errors.js";
import { withSignTimeout, type KeyManager, type SignerIdentity } from "./key-manager.js";
import { logger as rootLogger, type Logger } from "./log.js";
import { verifyEd25519 } from "./signing.js";

export type AttestorOptions = {
  keys: KeyManager;
  schemeId?: string;
  schemes?: SchemeRegistry;
  policy?: DecisionPolicy;
  signTimeoutMs?: number;
  now?: () => Date;
  logger?: Logger;
};

export type Attestor = {
  scheme_id: string;
  signer(): SignerIdentity;
  attest(decision: DecisionRecord): Promise<AttestationBundle>;
};

/**
 * validate -> canonicalize -> sign -> assemble.
 *
 * Atomic: attest() either resolves with a complete, self-consistent bundle or
 * rejects (InvalidDecisionError, KeyUnavailableError) and emits nothing.
 * An invalid decision never reaches the key manager.
 */
export function createAttestor(opts: AttestorOptions): Attestor {
  const schemeId = opts.schemeId ?? CURRENT_SCHEME_ID;
  const scheme = (opts.schemes ?? SUPPORTED_SCHEMES).get(schemeId);
  if (!scheme) throw new UnknownSchemeError(schemeId);

  const policy = opts.policy ?? DEFAULT_DECISION_POLICY;
  const keys = opts.signTimeoutMs ? withSignTimeout(opts.keys, opts.signTimeoutMs) : opts.keys;
  const now = opts.now ?? (() => new Date());
  const log = (opts.logger ?? rootLogger).child({ component: "attestor", scheme_id: scheme.id });

  return {
    scheme_id: scheme.id,

    signer: () => keys.publicIdentity(),

    async attest(input: DecisionRecord): Promise<AttestationBundle> {
      const validation = validateDecision(input, policy);
      if (!validation.ok) {
        log.warn("decision rejected", { issues: validation.issues.map((i) => `${i.path}: ${i.message}`) });
        throw new InvalidDecisionError(validation.issues);
      }

      // parsed copy: later changes to the caller's object cannot leak into the bundle
      const decision = freezeDecision(validation.decision);
      const bytes = scheme.canonicalize(decision);

      const signer = keys.publicIdentity();
      if (signer.alg !== scheme.signature_alg) {
        throw new KeyUnavailableError(`Key manager signs with ${signer.alg}, scheme ${scheme.id} needs ${scheme.signature_alg}`);
      }

      const signature = await keys.sign(bytes);

      // never hand out a bundle that would not verify
      if (!verifyEd25519(bytes, signature, signer.public_key)) {
        throw new KeyUnavailableError("Key manager returned a signature that does not verify");
      }

      const bundle: AttestationBundle = Object.freeze({
        scheme_id: scheme.id,
        decision,
        signature,
        signer: Object.freeze({ ...signer }),
        digest: canonicalDigest(bytes),
        issued_at: now().toISOString(),
      });

      log.info("attestation issued", {
        digest: bundle.digest,
        subject: decision.subject,
        signer: signer.address,
      });

      return bundle;
    },
  };
}
