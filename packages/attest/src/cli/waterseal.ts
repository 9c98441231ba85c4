// packages/attest/src/cli/waterseal.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";

import {
  CURRENT_SCHEME_ID,
  STRUCTURAL_ONLY_POLICY,
  canonicalDigest,
  canonicalizeDecision,
  validateDecision,
} from "../../../verdict/src/index.js";
import { createAttestor } from "../attestor.js";
import { loadConfig } from "../config.js";
import { WatersealError } from "../errors.js";
import { LocalKeyManager } from "../key-manager.js";
import { startServer, type RunningServer } from "../server.js";
import { createVerifier, requireSigner, type VerificationResult } from "../verifier.js";

export type CliIo = {
  out(line: string): void;
  err(line: string): void;
  env: NodeJS.ProcessEnv;
  cwd: string;
};

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
  cwd: process.cwd(),
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function usage(): string {
  return `waterseal - signed water-quality decisions

Usage:
  waterseal address
  waterseal canonical <decision.json> [--scheme <id>]
  waterseal attest <decision.json> [--out <bundle.json>]
  waterseal verify <bundle.json> [--json] [--expect-signer <address>]...
  waterseal serve

Environment:
  WATERSEAL_SECRET (or MNEMONIC)   signing secret, needed by address/attest/serve
  PORT, HOST, WATERSEAL_DB, WATERSEAL_SIGN_TIMEOUT_MS, LOG_LEVEL

Exit codes: 0 ok / VALID, 1 failure or not VALID, 2 usage
`;
}

// -------------------- arg helpers --------------------

class UsageError extends Error {}

class CliFailure extends Error {}

function getFlagValue(args: string[], flag: string): string | null {
  const i = args.indexOf(flag);
  if (i < 0) return null;
  const v = args[i + 1];
  if (v === undefined || v.startsWith("--")) throw new UsageError(`Missing value for ${flag}`);
  return v;
}

function getFlagValues(args: string[], flag: string): string[] {
  const out: string[] = [];
  args.forEach((a, i) => {
    if (a !== flag) return;
    const v = args[i + 1];
    if (v === undefined || v.startsWith("--")) throw new UsageError(`Missing value for ${flag}`);
    out.push(v);
  });
  return out;
}

function requireFile(args: string[]): string {
  const file = args[1];
  if (!file || file.startsWith("--")) throw new UsageError("Missing file.");
  return file;
}

// -------------------- file helpers --------------------

function readJsonFile(io: CliIo, filePath: string): unknown {
  const abs = path.resolve(io.cwd, filePath);
  let raw: string;
  try {
    raw = fs.readFileSync(abs, "utf8");
  } catch {
    throw new CliFailure(`file not found: ${filePath}`);
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new CliFailure(`"${filePath}" is not valid JSON`);
  }
}

function pretty(obj: unknown): string {
  return JSON.stringify(obj, null, 2);
}

// -------------------- commands --------------------

function cmdAddress(io: CliIo, asJson: boolean): number {
  const config = loadConfig(io.env);
  const keys = LocalKeyManager.fromSecret(config.secret);
  try {
    const identity = keys.publicIdentity();
    io.out(asJson ? pretty(identity) : identity.address);
  } finally {
    keys.destroy();
  }
  return EXIT_OK;
}

function cmdCanonical(io: CliIo, file: string, schemeId: string): number {
  const checked = validateDecision(readJsonFile(io, file), STRUCTURAL_ONLY_POLICY);
  if (!checked.ok) {
    for (const issue of checked.issues) io.err(`[waterseal] ${issue.path || "/"}: ${issue.message}`);
    return EXIT_FAILURE;
  }

  const bytes = canonicalizeDecision(checked.decision, schemeId);
  io.out(
    pretty({
      scheme_id: schemeId,
      digest: canonicalDigest(bytes),
      length: bytes.length,
      canonical_hex: Buffer.from(bytes).toString("hex"),
    })
  );
  return EXIT_OK;
}

async function cmdAttest(io: CliIo, file: string, outFile: string | null): Promise<number> {
  const decision = readJsonFile(io, file);
  const config = loadConfig(io.env);
  const keys = LocalKeyManager.fromSecret(config.secret);

  try {
    const attestor = createAttestor({ keys, signTimeoutMs: config.signTimeoutMs });
    // structural check here; decision policy is enforced by the attestor
    const checked = validateDecision(decision, STRUCTURAL_ONLY_POLICY);
    if (!checked.ok) {
      for (const issue of checked.issues) io.err(`[waterseal] ${issue.path || "/"}: ${issue.message}`);
      return EXIT_FAILURE;
    }

    const bundle = await attestor.attest(checked.decision);

    if (outFile) {
      fs.writeFileSync(path.resolve(io.cwd, outFile), pretty(bundle) + "\n", "utf8");
      io.err(`[waterseal] wrote ${outFile} (digest ${bundle.digest})`);
    } else {
      io.out(pretty(bundle));
    }
    return EXIT_OK;
  } finally {
    keys.destroy();
  }
}

function describeResult(result: VerificationResult): string {
  switch (result.code) {
    case "VALID":
      return `VALID scheme=${result.scheme_id} signer=${result.signer.address} digest=${result.digest}`;
    case "SIGNATURE_MISMATCH":
      return `SIGNATURE_MISMATCH (${result.reason}): ${result.message}`;
    case "UNKNOWN_SCHEME":
      return `UNKNOWN_SCHEME: ${result.message}`;
    case "MALFORMED_DECISION":
      return `MALFORMED_DECISION: ${result.message}`;
  }
}

function cmdVerify(io: CliIo, file: string, asJson: boolean, expectSigners: string[]): number {
  const result = createVerifier().verify(readJsonFile(io, file));
  const pinned = expectSigners.length > 0;
  const signerAllowed = pinned ? requireSigner(result, expectSigners) : null;

  if (asJson) {
    io.out(pretty(pinned ? { ...result, signer_allowed: signerAllowed } : result));
  } else {
    io.out(`[waterseal] ${describeResult(result)}`);
    if (result.ok && signerAllowed === false) {
      io.out(`[waterseal] signer ${result.signer.address} is not one of the expected signers`);
    }
  }

  return result.ok && signerAllowed !== false ? EXIT_OK : EXIT_FAILURE;
}

export type SignalSource = Pick<NodeJS.EventEmitter, "once">;

/**
 * Closes the server on the first SIGINT or SIGTERM: stops accepting requests,
 * closes the store and destroys the signing key.
 */
export function closeOnSignal(running: Pick<RunningServer, "close">, io: CliIo, signals: SignalSource = process): void {
  let closing = false;
  const stop = (signal: string) => {
    if (closing) return;
    closing = true;
    io.err(`[waterseal] ${signal} received, shutting down`);
    running.close().then(
      () => io.err("[waterseal] stopped"),
      (e: unknown) => io.err(`[waterseal] shutdown failed: ${e instanceof Error ? e.message : String(e)}`)
    );
  };

  signals.once("SIGINT", () => stop("SIGINT"));
  signals.once("SIGTERM", () => stop("SIGTERM"));
}

async function cmdServe(io: CliIo): Promise<number> {
  const running = await startServer(loadConfig(io.env));
  closeOnSignal(running, io);
  io.err(`[waterseal] listening on ${running.url}`);
  return EXIT_OK;
}

// -------------------- entry --------------------

/** Runs one command; resolves with the process exit code. `args` excludes node and script path. */
export async function run(args: string[], io: CliIo = defaultIo): Promise<number> {
  const cmd = args[0];

  try {
    if (!cmd || cmd === "--help" || cmd === "-h" || cmd === "help") {
      io.out(usage());
      return cmd ? EXIT_OK : EXIT_USAGE;
    }

    switch (cmd) {
      case "address":
        return cmdAddress(io, args.includes("--json"));
      case "canonical":
        return cmdCanonical(io, requireFile(args), getFlagValue(args, "--scheme") ?? CURRENT_SCHEME_ID);
      case "attest":
        return await cmdAttest(io, requireFile(args), getFlagValue(args, "--out"));
      case "verify":
        return cmdVerify(io, requireFile(args), args.includes("--json"), getFlagValues(args, "--expect-signer"));
      case "serve":
        return await cmdServe(io);
      default:
        throw new UsageError(`Unknown command: ${cmd}`);
    }
  } catch (e) {
    if (e instanceof UsageError) {
      io.err(`${e.message}\n`);
      io.err(usage());
      return EXIT_USAGE;
    }
    if (e instanceof CliFailure || e instanceof WatersealError) {
      io.err(`[waterseal] ${e.message}`);
      return EXIT_FAILURE;
    }
    throw e;
  }
}
