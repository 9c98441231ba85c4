// packages/attest/__tests__/_helpers/fixtures.ts
import { createDecisionRecord, type DecisionRecord } from "../../../verdict/src/index.js";
import { LocalKeyManager } from "../../src/key-manager.js";
import { setLogHandler, type LogEntry } from "../../src/log.js";

export const TEST_SECRET = "test-secret-for-waterseal";
export const OTHER_SECRET = "another-test-secret";

export const FIXED_NOW = () => new Date("2026-01-19T00:00:00.000Z");

export function sample42(): DecisionRecord {
  return createDecisionRecord({
    subject: "sample-42",
    verdict: {
      score: 0.8,
      flags: { drinking: false, bathing: true },
      risks: [{ category: "iron", severity: "medium", explanation: "elevated iron" }],
      remediation: ["boil for 5 minutes", "use iron filter"],
    },
    produced_at: 1700000000,
  });
}

export function testKeys(secret = TEST_SECRET): LocalKeyManager {
  return LocalKeyManager.fromSecret(secret);
}

/** Collects log entries until the returned `restore` is called. */
export function captureLogs(): { entries: LogEntry[]; restore: () => void } {
  const entries: LogEntry[] = [];
  setLogHandler((e) => entries.push(e));
  return { entries, restore: () => setLogHandler(null) };
}

/** Plain-JSON copy, as a bundle looks after crossing a process boundary. */
export function roundTrip<T>(value: T): unknown {
  return JSON.parse(JSON.stringify(value));
}
