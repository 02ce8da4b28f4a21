/**
 * @pledgebook/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Auth
    API_KEYS: z.string().default(""),

    // Ledger
    OWNER_ID: z.string().trim().min(1, "OWNER_ID must be a non-empty identity"),

    // On-chain price feed (both or neither)
    PRICE_FEED_ADDRESS: z.string().optional(),
    RPC_URL: z.string().url().optional(),
    FEED_REFRESH_MS: z.coerce.number().int().min(1000).default(60_000),

    // Mock price feed, used when no on-chain feed is configured
    MOCK_FEED_DECIMALS: z.coerce.number().int().min(0).max(18).default(8),
    MOCK_FEED_INITIAL_ANSWER: z
      .string()
      .regex(/^-?\d+$/, "MOCK_FEED_INITIAL_ANSWER must be an integer")
      .default("200000000000")
      .transform((v) => BigInt(v)),
  })
  .refine(
    (cfg) => (cfg.PRICE_FEED_ADDRESS === undefined) === (cfg.RPC_URL === undefined),
    {
      message: "PRICE_FEED_ADDRESS and RPC_URL must be set together",
      path: ["PRICE_FEED_ADDRESS"],
    },
  )
  // X-Caller-Id is only trusted outside production
  .refine((cfg) => cfg.NODE_ENV !== "production" || cfg.API_KEYS.trim() !== "", {
    message: "API_KEYS must be configured when NODE_ENV is production",
    path: ["API_KEYS"],
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into key records.
 *
 * Format: "key1:identity1,key2:identity2"
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ApiKeyRecord[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, identity] = parts;
    if (parts.length !== 2 || key === undefined || identity === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:identity`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (identity === "") {
      throw new Error("Identity cannot be empty in API_KEYS");
    }

    keys.push({ key, identity });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
