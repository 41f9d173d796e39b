/**
 * Session configuration from an environment record.
 *
 * The caller passes the record explicitly (usually `process.env`); nothing
 * here reads ambient state.
 */

import { z } from "zod";
import { ConfigurationError, type Credentials } from "@agent-ledger/stream-client";
import { MAX_TIMEOUT_MS } from "./session.js";

export interface SessionConfig {
  endpoint: string;
  credentials: Credentials;
  outputDir: string;
  timeoutMs: number;
  strict: boolean;
  retry: { maxRetries: number };
  logLevel: string;
}

const TRUTHY = new Set(["1", "true", "yes", "on"]);

const envSchema = z.object({
  AGENT_ENDPOINT: z.string().url(),
  AGENT_TOKEN: z.string().min(1),
  AGENT_TOKEN_TYPE: z.string().min(1).optional(),
  AGENT_RUN_DIR: z.string().min(1).default("./runs"),
  AGENT_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).default(120_000),
  AGENT_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  AGENT_STRICT_DECODE: z
    .string()
    .optional()
    .transform((value) => value !== undefined && TRUTHY.has(value.trim().toLowerCase())),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

/**
 * Validate and convert environment variables into session options.
 *
 * @throws {ConfigurationError} Listing every invalid or missing variable.
 */
export function loadSessionConfig(
  env: Record<string, string | undefined>,
): SessionConfig {
  // Empty strings count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment: ${problems}`, {
      cause: parsed.error,
    });
  }

  const vars = parsed.data;
  return {
    endpoint: vars.AGENT_ENDPOINT,
    credentials: vars.AGENT_TOKEN_TYPE
      ? { token: vars.AGENT_TOKEN, scheme: vars.AGENT_TOKEN_TYPE }
      : { token: vars.AGENT_TOKEN },
    outputDir: vars.AGENT_RUN_DIR,
    timeoutMs: vars.AGENT_TIMEOUT_MS,
    strict: vars.AGENT_STRICT_DECODE,
    retry: { maxRetries: vars.AGENT_MAX_RETRIES },
    logLevel: vars.LOG_LEVEL,
  };
}
