#!/usr/bin/env node
// packages/attest/src/cli/bin.ts
import { run } from "./waterseal.js";

run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("[waterseal] unexpected error:", err instanceof Error ? err.stack ?? err.message : err);
    process.exitCode = 1;
  }
);
