/**
 * @navledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Logger } from "pino";
import type { Clock } from "@navledger/types";
import type { ApiKeyRecord } from "./types/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { NavServiceConfig } from "./services/nav-service.js";

const BooleanString = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
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
  JWT_SECRET: z.string().optional(),
  JWT_ISSUER: z.string().default("navledger"),

  // Role holders
  ADMIN_ADDRESS: z.string().min(1),
  OPERATOR_ADDRESS: z.string().min(1),
  GUARDIAN_ADDRESS: z.string().min(1),
  REPORTER_ADDRESS: z.string().min(1),

  // Asset
  ASSET_ADDRESS: z.string().min(1).default("0x000000000000000000000000000000000000a55e"),
  ASSET_NAME: z.string().default("USD Coin"),
  ASSET_SYMBOL: z.string().default("USDC"),
  ASSET_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),
  ASSET_FAUCET_ENABLED: BooleanString,

  // Oracle
  ORACLE_ADDRESS: z.string().min(1).default("0x00000000000000000000000000000000000002ac"),
  ORACLE_MAX_STALENESS_SECONDS: z.coerce.number().int().min(1).default(3600),
  ORACLE_MAX_MOVE_BPS: z.coerce.number().int().min(0).max(10_000).default(100),

  // Vault
  VAULT_ADDRESS: z.string().min(1).default("0x0000000000000000000000000000000000000a17"),
  VAULT_NAME: z.string().default("NAV Vault Share"),
  VAULT_SYMBOL: z.string().default("nvUSDC"),
  VAULT_MAX_STALENESS_SECONDS: z.coerce.number().int().min(1).default(300),
  EPOCH_SECONDS: z.coerce.number().int().min(1).default(86400),
  EXIT_FEE_BPS: z.coerce.number().int().min(0).default(0),
  LIQUIDITY_RECIPIENT: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:address1,key2:address2"
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ApiKeyRecord[] = [];

  for (const entry of raw.split(",")) {
    const [key, address, ...rest] = entry.trim().split(":");
    if (key === undefined || address === undefined || rest.length > 0) {
      throw new Error(`Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`);
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (address === "") {
      throw new Error(`Address cannot be empty for API key "${key}"`);
    }

    keys.push({ key, address });
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

// =============================================================================
// Derived Settings
// =============================================================================

export function toServiceConfig(config: AppConfig, clock: Clock, logger?: Logger): NavServiceConfig {
  return {
    clock,
    admin: config.ADMIN_ADDRESS,
    operator: config.OPERATOR_ADDRESS,
    guardian: config.GUARDIAN_ADDRESS,
    reporter: config.REPORTER_ADDRESS,
    asset: {
      address: config.ASSET_ADDRESS,
      name: config.ASSET_NAME,
      symbol: config.ASSET_SYMBOL,
      decimals: config.ASSET_DECIMALS,
    },
    oracle: {
      address: config.ORACLE_ADDRESS,
      maxStalenessSeconds: config.ORACLE_MAX_STALENESS_SECONDS,
      maxMoveBps: config.ORACLE_MAX_MOVE_BPS,
    },
    vault: {
      address: config.VAULT_ADDRESS,
      name: config.VAULT_NAME,
      symbol: config.VAULT_SYMBOL,
      maxAllowedStaleness: config.VAULT_MAX_STALENESS_SECONDS,
      epochSeconds: config.EPOCH_SECONDS,
      exitFeeBps: config.EXIT_FEE_BPS,
      liquidityRecipient: config.LIQUIDITY_RECIPIENT,
    },
    faucetEnabled: config.ASSET_FAUCET_ENABLED,
    logger,
  };
}

/**
 * Secured mode is on when any API key or a JWT secret is configured.
 */
export function toAuthConfig(config: AppConfig): AuthConfig | undefined {
  const keys = parseApiKeys(config.API_KEYS);
  if (keys.length === 0 && config.JWT_SECRET === undefined) {
    return undefined;
  }
  return {
    apiKeys: new Map(keys.map((record) => [record.key, record])),
    jwtSecret: config.JWT_SECRET,
    jwtIssuer: config.JWT_ISSUER,
  };
}
