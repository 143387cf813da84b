/**
 * @kitty-wallet/wallet — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const BooleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Wallet
  WALLET_DATA_DIR: z.string().min(1).optional(),
  WALLET_NO_SYNC: BooleanFlag,
  WALLET_TRACK_ALL_OWNERS: BooleanFlag,
  WALLET_FINALITY_DEPTH: z.coerce.number().int().positive().default(100),
});

export type WalletConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): WalletConfig {
  return ConfigSchema.parse(env);
}
