import {
  DEFAULT_DECISION_POLICY,
  SUPPORTED_SCHEMES,
  canonicalDigest,
  validateDecision,
  type DecisionIssue,
  type DecisionPolicy,
  type SchemeRegistry,
} from "../../verdict/src/index.js";
import { SignatureSchema, SignerIdentitySchema } from "./bundle.js";
import { addressFromPublicKey, verifyEd25519, type SignerIdentity } from "./signing.js";

export type MismatchReason =
  | "malformed_signer"
  | "malformed_signature"
  | "alg_mismatch"
  | "address_mismatch"
  | "digest_mismatch"
  | "bad_signature"
  | "verifier_fault";

export type VerificationResult =
  | { ok: true; code: "VALID"; scheme_id: string; signer: SignerIdentity; digest: string }
  | { ok: false; code: "SIGNATURE_MISMATCH"; reason: MismatchReason; message: string }
  | { ok: false; code: "UNKNOWN_SCHEME"; scheme_id: string | null; message: string }
  | { ok: false; code: "MALFORMED_DECISION"; issues: DecisionIssue[]; message: string };

export type VerificationCode = VerificationResult["code"];

export type VerifierOptions = {
  schemes?: SchemeRegistry;
  policy?: DecisionPolicy;
};

export type Verifier = {
  schemes(): string[];
  verify(bundle: unknown): VerificationResult;
};

// -----------------------------
// Helpers
// -----------------------------
function mismatch(reason: MismatchReason, message: string): VerificationResult {
  return { ok: false, code: "SIGNATURE_MISMATCH", reason, message };
}

// Own data properties only: no getters, no prototype lookups.
function readField(input: unknown, key: string): unknown {
  if (typeof input !== "object" || input === null || Array.isArray(input)) return undefined;
  return Object.getOwnPropertyDescriptor(input, key)?.value;
}

function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Low-level check: does `signature` by `signer` cover exactly `bytes` under
 * `scheme_id`? Inputs are untrusted; never throws.
 */
export function verifySignedBytes(
  params: {
    scheme_id: string;
    bytes: Uint8Array;
    signature: unknown;
    signer: unknown;
  },
  schemes: SchemeRegistry = SUPPORTED_SCHEMES
): VerificationResult {
  const scheme = schemes.get(params.scheme_id);
  if (!scheme) {
    return {
      ok: false,
      code: "UNKNOWN_SCHEME",
      scheme_id: params.scheme_id,
      message: `Unsupported scheme_id: ${params.scheme_id}`,
    };
  }

  const signer = SignerIdentitySchema.safeParse(params.signer);
  if (!signer.success) return mismatch("malformed_signer", "Signer identity is malformed.");

  const signature = SignatureSchema.safeParse(params.signature);
  if (!signature.success) return mismatch("malformed_signature", "Signature is not a base64 Ed25519 signature.");

  if (signer.data.alg !== scheme.signature_alg) {
    return mismatch("alg_mismatch", `Scheme ${scheme.id} expects ${scheme.signature_alg}, signer uses ${signer.data.alg}.`);
  }

  if (addressFromPublicKey(Buffer.from(signer.data.public_key, "hex")) !== signer.data.address) {
    return mismatch("address_mismatch", "Signer address does not belong to the signer public key.");
  }

  if (!verifyEd25519(params.bytes, signature.data, signer.data.public_key)) {
    return mismatch("bad_signature", "Signature does not match the canonical bytes for this signer.");
  }

  return {
    ok: true,
    code: "VALID",
    scheme_id: scheme.id,
    signer: { ...signer.data },
    digest: canonicalDigest(params.bytes),
  };
}

/**
 * Verify an attestation bundle taken straight from untrusted input.
 *
 * Order: scheme -> decision validation -> signer/signature -> digest -> signature.
 * Every input maps to a VerificationResult; nothing escapes as an exception.
 *
 * VALID says who signed. Whether that signer is trusted is the caller's
 * decision (see requireSigner).
 */
export function createVerifier(opts: VerifierOptions = {}): Verifier {
  const schemes = opts.schemes ?? SUPPORTED_SCHEMES;
  const policy = opts.policy ?? DEFAULT_DECISION_POLICY;

  function verifyUnsafe(bundle: unknown): VerificationResult {
    const scheme_id = readField(bundle, "scheme_id");
    const scheme = typeof scheme_id === "string" ? schemes.get(scheme_id) : null;
    if (!scheme) {
      return {
        ok: false,
        code: "UNKNOWN_SCHEME",
        scheme_id: typeof scheme_id === "string" ? scheme_id : null,
        message:
          typeof scheme_id === "string"
            ? `Unsupported scheme_id: ${scheme_id} (known: ${schemes.ids().join(", ")})`
            : "Bundle carries no scheme_id.",
      };
    }

    const validation = validateDecision(readField(bundle, "decision"), policy);
    if (!validation.ok) {
      return {
        ok: false,
        code: "MALFORMED_DECISION",
        issues: validation.issues,
        message: `Embedded decision failed validation (${validation.issues.length} issue(s)).`,
      };
    }

    const bytes = scheme.canonicalize(validation.decision);

    const digest = readField(bundle, "digest");
    if (digest !== undefined && digest !== canonicalDigest(bytes)) {
      return mismatch("digest_mismatch", "Bundle digest does not match the canonical bytes of its decision.");
    }

    return verifySignedBytes(
      {
        scheme_id: scheme.id,
        bytes,
        signature: readField(bundle, "signature"),
        signer: readField(bundle, "signer"),
      },
      schemes
    );
  }

  return {
    schemes: () => schemes.ids(),
    verify(bundle: unknown): VerificationResult {
      try {
        return verifyUnsafe(bundle);
      } catch (e) {
        return mismatch("verifier_fault", `Verification aborted: ${describeError(e)}`);
      }
    },
  };
}

/**
 * Signer pinning on top of a VALID result. `allowed` holds addresses or raw
 * public keys (hex).
 */
export function requireSigner(result: VerificationResult, allowed: readonly string[]): boolean {
  if (!result.ok) return false;
  const wanted = new Set(allowed.map((a) => a.toLowerCase()));
  return wanted.has(result.signer.address) || wanted.has(result.signer.public_key);
}
