/**
 * Attestation API routes.
 *
 * POST /judge                 sample → { bundle, input_processed }
 * POST /attest                decision → signed bundle
 * POST /verify                bundle → verification result
 * GET  /attestations          newest bundles, or one subject's (?subject=)
 * GET  /attestations/:digest  stored bundle
 *
 * /judge echoes the sample after defaults are applied: an anonymous sample's
 * subject is the sha256 of that normalized form, not of the raw request.
 */

import { Router } from "express";
import { z } from "zod";
import { STRUCTURAL_ONLY_POLICY, validateDecision } from "../../../verdict/src/index.js";
import type { Attestor } from "../attestor.js";
import { DigestSchema } from "../bundle.js";
import type { AttestationStore } from "../store.js";
import type { Verifier } from "../verifier.js";
import { WaterSampleSchema, type DecisionProducer } from "../producer/producer.js";
import { apiError, asyncRoute, RequestValidationError } from "./middleware.js";

const ListQuerySchema = z.object({
  subject: z.string().min(1).max(256).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export type RouteDeps = {
  attestor: Attestor;
  verifier: Verifier;
  producer: DecisionProducer;
  store: AttestationStore;
};

export function createAttestationRoutes(deps: RouteDeps): Router {
  const router = Router();

  router.post(
    "/judge",
    asyncRoute(async (req, res) => {
      const sample = WaterSampleSchema.parse(req.body);
      const decision = await deps.producer.produce(sample);
      const bundle = await deps.attestor.attest(decision);
      await deps.store.putBundle(bundle);
      res.status(201).json({ bundle, input_processed: sample });
    })
  );

  router.post(
    "/attest",
    asyncRoute(async (req, res) => {
      // shape problems are the caller's request; policy problems are the decision's
      const shape = validateDecision(req.body, STRUCTURAL_ONLY_POLICY);
      if (!shape.ok) throw new RequestValidationError("Decision record failed validation", shape.issues);

      const bundle = await deps.attestor.attest(shape.decision);
      await deps.store.putBundle(bundle);
      res.status(201).json(bundle);
    })
  );

  router.post("/verify", (req, res) => {
    res.status(200).json(deps.verifier.verify(req.body));
  });

  router.get(
    "/attestations",
    asyncRoute(async (req, res) => {
      const query = ListQuerySchema.safeParse(req.query);
      if (!query.success) throw new RequestValidationError("Invalid list query", query.error.issues);

      const { subject, limit } = query.data;
      const attestations = subject
        ? await deps.store.listBySubject(subject)
        : await deps.store.listBundles(limit);
      res.json({ attestations });
    })
  );

  router.get(
    "/attestations/:digest",
    asyncRoute(async (req, res) => {
      const digest = DigestSchema.safeParse(req.params.digest);
      if (!digest.success) throw new RequestValidationError("digest must be 64 lowercase hex characters");

      const bundle = await deps.store.getBundle(digest.data);
      if (!bundle) {
        res.status(404).json(apiError("NOT_FOUND", `No attestation with digest ${digest.data}`));
        return;
      }
      res.json(bundle);
    })
  );

  return router;
}
