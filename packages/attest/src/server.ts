/**
 * Express server: the judge/attest/verify surface with its dependencies
 * injected through an AppContext.
 */

import express from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { createAttestor, type Attestor } from "./attestor.js";
import type { WatersealConfig } from "./config.js";
import { InMemoryAttestationStore } from "./in-memory-store.js";
import { LocalKeyManager, type KeyManager } from "./key-manager.js";
import { logger, setLogLevel } from "./log.js";
import type { DecisionProducer } from "./producer/producer.js";
import { createReferenceRangeProducer } from "./producer/reference-range.js";
import { SqliteAttestationStore } from "./sqlite-store.js";
import type { AttestationStore } from "./store.js";
import { createVerifier, type Verifier } from "./verifier.js";
import { errorHandler } from "./api/middleware.js";
import { createAttestationRoutes } from "./api/routes.js";

export const SERVICE_NAME = "waterseal";
export const SERVICE_VERSION = "0.1.0";

/** Application context containing all services. */
export interface AppContext {
  keys: KeyManager;
  attestor: Attestor;
  verifier: Verifier;
  producer: DecisionProducer;
  store: AttestationStore;
}

export type AppContextOptions = {
  keys: KeyManager;
  store?: AttestationStore;
  producer?: DecisionProducer;
  signTimeoutMs?: number;
};

export function createAppContext(opts: AppContextOptions): AppContext {
  return {
    keys: opts.keys,
    attestor: createAttestor({ keys: opts.keys, signTimeoutMs: opts.signTimeoutMs }),
    verifier: createVerifier(),
    producer: opts.producer ?? createReferenceRangeProducer(),
    store: opts.store ?? new InMemoryAttestationStore(),
  };
}

export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.use(express.json({ limit: "256kb" }));

  app.get("/", (_req, res) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      judge_address: ctx.attestor.signer().address,
      scheme_id: ctx.attestor.scheme_id,
    });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/", createAttestationRoutes(ctx));

  app.use(errorHandler);

  return app;
}

export type RunningServer = {
  server: Server;
  url: string;
  close(): Promise<void>;
};

/** Wires config → key manager → store → app and starts listening. */
export async function startServer(config: WatersealConfig): Promise<RunningServer> {
  setLogLevel(config.logLevel);

  const keys = LocalKeyManager.fromSecret(config.secret);
  const store: AttestationStore = config.dbPath ? new SqliteAttestationStore(config.dbPath) : new InMemoryAttestationStore();
  const ctx = createAppContext({ keys, store, signTimeoutMs: config.signTimeoutMs });
  const app = createApp(ctx);

  const server = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(config.port, config.host, () => resolve(s));
    s.once("error", reject);
  });

  const addr: AddressInfo | string | null = server.address();
  const port = addr && typeof addr === "object" ? addr.port : config.port;
  const url = `http://${config.host}:${port}`;

  logger.info("server listening", {
    url,
    judge_address: keys.publicIdentity().address,
    store: config.dbPath ? "sqlite" : "memory",
  });

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => {
          store.close?.();
          keys.destroy();
          if (err) reject(err);
          else resolve();
        });
      }),
  };
}
