import { z } from "zod";
import { DecisionRecordSchema, type DecisionRecord } from "../../verdict/src/index.js";
import {
  ED25519_PUBLIC_KEY_HEX,
  ED25519_SIGNATURE_B64,
  SIGNER_ADDRESS,
  type SignerIdentity,
} from "./signing.js";

/**
 * The only artifact that crosses the trust boundary. Created once by the
 * attestor (frozen), consumed by any number of verifiers.
 *
 * `digest` and `issued_at` are metadata: not part of the signed bytes.
 * The verifier re-checks `digest` when present.
 */
export type AttestationBundle = {
  readonly scheme_id: string;
  readonly decision: DecisionRecord;
  readonly signature: string; // base64
  readonly signer: Readonly<SignerIdentity>;
  readonly digest: string; // sha256(canonical bytes), hex
  readonly issued_at: string; // ISO
};

export const SignerIdentitySchema = z
  .object({
    alg: z.literal("ed25519"),
    public_key: z.string().regex(ED25519_PUBLIC_KEY_HEX),
    address: z.string().regex(SIGNER_ADDRESS),
  })
  .strict();

export const SignatureSchema = z.string().regex(ED25519_SIGNATURE_B64);

export const DigestSchema = z.string().regex(/^[0-9a-f]{64}$/);

export const AttestationBundleSchema = z
  .object({
    scheme_id: z.string().min(1),
    decision: DecisionRecordSchema,
    signature: SignatureSchema,
    signer: SignerIdentitySchema,
    digest: DigestSchema,
    issued_at: z.string().refine((v) => !Number.isNaN(Date.parse(v)), "Invalid ISO-8601 timestamp"),
  })
  .strict();

/**
 * Shape check for bundles read back from storage or files. Says nothing about
 * authenticity; that is the verifier's job.
 */
export function parseBundle(input: unknown): AttestationBundle {
  return AttestationBundleSchema.parse(input);
}
