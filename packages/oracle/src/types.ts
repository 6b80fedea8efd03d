/**
 * @navledger/oracle — NAV price feed types.
 *
 * Rules:
 * - Prices are 1e18-scaled bigint (1.0 === 10n ** 18n)
 * - A fresh feed has price 0 ("not yet primed")
 * - Timestamps are unix seconds
 */

import type { Address } from "@navledger/types";

// =============================================================================
// Snapshot & Config
// =============================================================================

/**
 * The last accepted `(price, timestamp)` pair.
 */
export interface NavSnapshot {
  readonly price: bigint;
  readonly updatedAt: number;
}

export interface OracleConfig {
  /** Oldest acceptable report age, and the cap consumers may self-limit to. Always > 0. */
  readonly maxStalenessSeconds: number;

  /** Largest move between consecutive prices, in bps. 0 disables the guard. */
  readonly maxMoveBps: number;
}

// =============================================================================
// Consumer Contract
// =============================================================================

/**
 * What a vault needs from its price source.
 */
export interface PriceSource {
  readonly address: Address;
  getPrice(): NavSnapshot;
  isValid(): boolean;
  maxOracleStaleness(): number;
}

// =============================================================================
// Error
// =============================================================================

export type OracleErrorCode =
  | "ZERO_VALUE"
  | "STALE_TIMESTAMP"
  | "TOO_LARGE_MOVE"
  | "INVALID_CONFIG";

export class OracleError extends Error {
  public readonly code: OracleErrorCode;

  constructor(code: OracleErrorCode, message: string) {
    super(message);
    this.name = "OracleError";
    this.code = code;
  }
}
