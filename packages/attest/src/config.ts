import { z, type ZodIssue } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./log.js";

export type WatersealConfig = {
  secret: string;
  port: number;
  host: string;
  dbPath: string | null; // null = in-memory store
  signTimeoutMs: number;
  logLevel: LogLevel;
};

const MIN_SECRET_LENGTH = 16;

const EnvSchema = z.object({
  WATERSEAL_SECRET: z.string().min(MIN_SECRET_LENGTH, `must be at least ${MIN_SECRET_LENGTH} characters`),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default("0.0.0.0"),
  WATERSEAL_DB: z.string().min(1).optional(),
  WATERSEAL_SIGN_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

// zod's own enum message quotes the received value; keep values out of errors
function describeIssue(i: ZodIssue): string {
  if (i.code === "invalid_type" && i.received === "undefined") return "is required";
  if (i.code === "invalid_enum_value") return `must be one of ${i.options.join(", ")}`;
  return i.message;
}

function blankToUndefined(v: string | undefined): string | undefined {
  return v === undefined || v.trim() === "" ? undefined : v;
}

/**
 * Reads the service configuration from an environment map.
 * MNEMONIC is accepted as a fallback name for the signing secret.
 *
 * Errors name the offending variables only; values are never echoed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): WatersealConfig {
  const parsed = EnvSchema.safeParse({
    WATERSEAL_SECRET: blankToUndefined(env.WATERSEAL_SECRET) ?? blankToUndefined(env.MNEMONIC),
    PORT: blankToUndefined(env.PORT),
    HOST: blankToUndefined(env.HOST),
    WATERSEAL_DB: blankToUndefined(env.WATERSEAL_DB),
    WATERSEAL_SIGN_TIMEOUT_MS: blankToUndefined(env.WATERSEAL_SIGN_TIMEOUT_MS),
    LOG_LEVEL: blankToUndefined(env.LOG_LEVEL),
  });

  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((i) => String(i.path[0])))];
    const detail = parsed.error.issues
      .map((i) => `${String(i.path[0])}: ${describeIssue(i)}`)
      .join("; ");
    throw new ConfigError(variables, `Invalid configuration: ${detail}`);
  }

  const e = parsed.data;
  return {
    secret: e.WATERSEAL_SECRET,
    port: e.PORT,
    host: e.HOST,
    dbPath: e.WATERSEAL_DB ?? null,
    signTimeoutMs: e.WATERSEAL_SIGN_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
  };
}
