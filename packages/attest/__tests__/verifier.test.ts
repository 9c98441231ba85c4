import { describe, it, expect } from "vitest";

import {
  canonicalizeDecision,
  createSchemeRegistry,
  encodeDecisionTlv,
  type CanonicalScheme,
} from "../../verdict/src/index.js";
import { createAttestor } from "../src/attestor.js";
import type { AttestationBundle } from "../src/bundle.js";
import { createVerifier, requireSigner, verifySignedBytes } from "../src/verifier.js";
import { OTHER_SECRET, roundTrip, sample42, testKeys } from "./_helpers/fixtures.js";

async function issued(secret?: string): Promise<AttestationBundle> {
  return createAttestor({ keys: testKeys(secret) }).attest(sample42());
}

/** JSON copy of a bundle with edits applied, as an attacker would send it. */
function tampered(bundle: AttestationBundle, edit: (b: Record<string, unknown>) => void): unknown {
  const copy = JSON.parse(JSON.stringify(bundle));
  edit(copy);
  return copy;
}

describe("verifier: sample-42", () => {
  it("is VALID against the recorded signer", async () => {
    const keys = testKeys();
    const bundle = await createAttestor({ keys }).attest(sample42());
    const result = createVerifier().verify(roundTrip(bundle));

    expect(result.code).toBe("VALID");
    expect(requireSigner(result, [keys.publicIdentity().address])).toBe(true);
    expect(requireSigner(result, [keys.publicIdentity().public_key.toUpperCase()])).toBe(true);
  });

  it("is a SIGNATURE_MISMATCH once the score is changed to 0.9", async () => {
    const bundle = await issued();
    const edited = tampered(bundle, (b) => {
      b.decision = { ...bundle.decision, verdict: { ...bundle.decision.verdict, score: 0.9 } };
    });

    const result = createVerifier().verify(edited);
    expect(result).toEqual({
      ok: false,
      code: "SIGNATURE_MISMATCH",
      reason: "digest_mismatch",
      message: "Bundle digest does not match the canonical bytes of its decision.",
    });
  });

  it("is a SIGNATURE_MISMATCH on the signature itself when the digest is dropped too", async () => {
    const bundle = await issued();
    const edited = tampered(bundle, (b) => {
      b.decision = { ...bundle.decision, verdict: { ...bundle.decision.verdict, score: 0.9 } };
      delete b.digest;
    });

    const result = createVerifier().verify(edited);
    expect(result.code).toBe("SIGNATURE_MISMATCH");
    if (result.code === "SIGNATURE_MISMATCH") expect(result.reason).toBe("bad_signature");
  });
});

describe("verifier: tampering", () => {
  it("rejects any single flipped bit of the canonical bytes", async () => {
    const bundle = await issued();
    const bytes = Buffer.from(canonicalizeDecision(bundle.decision));

    expect(
      verifySignedBytes({ scheme_id: "v1", bytes, signature: bundle.signature, signer: bundle.signer }).code
    ).toBe("VALID");

    for (let i = 0; i < bytes.length; i++) {
      for (let bit = 0; bit < 8; bit++) {
        const flipped = Buffer.from(bytes);
        flipped[i] ^= 1 << bit;
        const result = verifySignedBytes({
          scheme_id: "v1",
          bytes: flipped,
          signature: bundle.signature,
          signer: bundle.signer,
        });
        expect(result.code).toBe("SIGNATURE_MISMATCH");
      }
    }
  });

  it("treats issued_at as unsigned metadata", async () => {
    const bundle = await issued();
    const edited = tampered(bundle, (b) => {
      b.issued_at = "2030-01-01T00:00:00.000Z";
    });
    expect(createVerifier().verify(edited).code).toBe("VALID");
  });

  it("rejects a swapped signer that did not sign", async () => {
    const bundle = await issued();
    const other = testKeys(OTHER_SECRET).publicIdentity();
    const result = createVerifier().verify(tampered(bundle, (b) => (b.signer = other)));

    expect(result.code).toBe("SIGNATURE_MISMATCH");
    if (result.code === "SIGNATURE_MISMATCH") expect(result.reason).toBe("bad_signature");
  });

  it("rejects an address that does not belong to the public key", async () => {
    const bundle = await issued();
    const other = testKeys(OTHER_SECRET).publicIdentity();
    const result = createVerifier().verify(
      tampered(bundle, (b) => (b.signer = { ...bundle.signer, address: other.address }))
    );

    expect(result.code).toBe("SIGNATURE_MISMATCH");
    if (result.code === "SIGNATURE_MISMATCH") expect(result.reason).toBe("address_mismatch");
  });

  it("reports a re-signed bundle as VALID for the substitute signer only", async () => {
    const original = await issued();
    const forged = await issued(OTHER_SECRET);

    const result = createVerifier().verify(roundTrip(forged));
    expect(result.code).toBe("VALID");
    if (result.ok) expect(result.signer.address).not.toBe(original.signer.address);

    expect(requireSigner(result, [original.signer.address])).toBe(false);
    expect(requireSigner(result, [forged.signer.address])).toBe(true);
  });
});

describe("verifier: schemes", () => {
  const v2: CanonicalScheme = {
    id: "v2",
    signature_alg: "ed25519",
    canonicalize: (d) => encodeDecisionTlv(d, "v2"),
  };

  it("reports UNKNOWN_SCHEME for a v1 bundle at a v2-only verifier", async () => {
    const bundle = await issued();
    const verifier = createVerifier({ schemes: createSchemeRegistry([v2]) });

    expect(verifier.schemes()).toEqual(["v2"]);
    expect(verifier.verify(bundle)).toEqual({
      ok: false,
      code: "UNKNOWN_SCHEME",
      scheme_id: "v1",
      message: "Unsupported scheme_id: v1 (known: v2)",
    });
  });

  it("does not accept a v1 signature relabelled as v2", async () => {
    const bundle = await issued();
    const verifier = createVerifier({ schemes: createSchemeRegistry([v2]) });
    const relabelled = tampered(bundle, (b) => {
      b.scheme_id = "v2";
      delete b.digest;
    });

    const result = verifier.verify(relabelled);
    expect(result.code).toBe("SIGNATURE_MISMATCH");
  });
});

describe("verifier: untrusted input", () => {
  it("maps malformed bundles to results without throwing", async () => {
    const bundle = await issued();
    const verifier = createVerifier();

    expect(verifier.verify(null)).toEqual({
      ok: false,
      code: "UNKNOWN_SCHEME",
      scheme_id: null,
      message: "Bundle carries no scheme_id.",
    });
    expect(verifier.verify("v1").code).toBe("UNKNOWN_SCHEME");
    expect(verifier.verify([bundle]).code).toBe("UNKNOWN_SCHEME");
    expect(verifier.verify({ scheme_id: 1 }).code).toBe("UNKNOWN_SCHEME");
    expect(verifier.verify({ scheme_id: "constructor" }).code).toBe("UNKNOWN_SCHEME");

    expect(verifier.verify({ scheme_id: "v1" })).toEqual({
      ok: false,
      code: "MALFORMED_DECISION",
      issues: [{ code: "SCHEMA", message: "Required", path: "" }],
      message: "Embedded decision failed validation (1 issue(s)).",
    });

    const malformed = [
      tampered(bundle, (b) => (b.signature = "not-a-signature")),
      tampered(bundle, (b) => (b.signature = 42)),
      tampered(bundle, (b) => (b.signer = null)),
      tampered(bundle, (b) => (b.signer = { ...bundle.signer, alg: "rsa" })),
      tampered(bundle, (b) => (b.signer = { ...bundle.signer, public_key: "zz" })),
    ];
    for (const m of malformed) expect(verifier.verify(m).code).toBe("SIGNATURE_MISMATCH");
  });

  it("reports an invalid embedded decision as MALFORMED_DECISION", async () => {
    const bundle = await issued();
    const result = createVerifier().verify(
      tampered(bundle, (b) => {
        b.decision = { ...bundle.decision, verdict: { ...bundle.decision.verdict, score: 1.7 } };
      })
    );

    expect(result.code).toBe("MALFORMED_DECISION");
    if (result.code === "MALFORMED_DECISION") expect(result.issues[0].path).toBe("/verdict/score");
  });

  it("does not run getters on the bundle", async () => {
    const bundle = await issued();
    const hostile = { ...bundle };
    Object.defineProperty(hostile, "signature", {
      enumerable: true,
      get() {
        throw new Error("getter ran");
      },
    });

    const result = createVerifier().verify(hostile);
    expect(result.code).toBe("SIGNATURE_MISMATCH");
    if (result.code === "SIGNATURE_MISMATCH") expect(result.reason).toBe("malformed_signature");
  });

  it("turns unexpected faults into a mismatch", () => {
    const hostile = new Proxy(
      {},
      {
        getOwnPropertyDescriptor() {
          throw new Error("boom");
        },
      }
    );

    expect(createVerifier().verify(hostile)).toEqual({
      ok: false,
      code: "SIGNATURE_MISMATCH",
      reason: "verifier_fault",
      message: "Verification aborted: boom",
    });
  });

  it("requireSigner is false for any non-VALID result", async () => {
    const bundle = await issued();
    const result = createVerifier().verify(tampered(bundle, (b) => (b.signature = "x")));
    expect(requireSigner(result, [bundle.signer.address])).toBe(false);
  });
});
