import { reviseDecisionRecord } from "../packages/verdict/src/index.js";
import {
  LocalKeyManager,
  SqliteAttestationStore,
  WaterSampleSchema,
  createAttestor,
  createReferenceRangeProducer,
  createVerifier,
} from "../packages/attest/src/index.js";

async function main() {
  const store = new SqliteAttestationStore(":memory:");
  const keys = LocalKeyManager.fromSecret("demo-secret-not-for-production");

  const producer = createReferenceRangeProducer({ now: () => 1700000000 });
  const attestor = createAttestor({ keys, now: () => new Date("2025-01-01T00:00:00.000Z") });
  const verifier = createVerifier();

  const sample = WaterSampleSchema.parse({
    sample_id: "well-7",
    use_case: "drinking",
    strip_values: { iron: 0.45, ph: 7.1, nitrate: 12 },
  });

  const decision = await producer.produce(sample);
  const bundle = await attestor.attest(decision);
  await store.putBundle(bundle);

  console.log("signer  =", bundle.signer.address);
  console.log("digest  =", bundle.digest);
  console.log("verdict =", JSON.stringify(bundle.decision.verdict, null, 2));

  const stored = await store.getBundle(bundle.digest);
  console.log("verify(stored)   =", verifier.verify(stored).code);

  // edit after signing, keep the old signature
  const edited = reviseDecisionRecord(bundle.decision, { verdict: { score: 0.9 } });
  const forged = { ...bundle, decision: edited, digest: undefined };
  console.log("verify(tampered) =", verifier.verify(JSON.parse(JSON.stringify(forged))).code);

  store.close();
  keys.destroy();
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
