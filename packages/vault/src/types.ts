/**
 * @navledger/vault — Domain types.
 *
 * Rules:
 * - Asset and share amounts are bigint base units; shares use the asset's decimals
 * - Timestamps are unix seconds
 * - Withdrawal requests are never deleted; closed requests stay readable
 */

import type { Address, Clock } from "@navledger/types";
import type { FungibleToken } from "@navledger/ledger";
import type { EventCatalog, EventStore } from "@navledger/event-store";
import type { PriceSource } from "@navledger/oracle";

// =============================================================================
// Constants
// =============================================================================

/** Highest configurable exit fee (2%). */
export const MAX_EXIT_FEE_BPS = 200;

/** "Unbounded" for max* views. */
export const MAX_UINT256 = 2n ** 256n - 1n;

// =============================================================================
// Configuration
// =============================================================================

export interface VaultConfig {
  /** Vault-side staleness window; never above the oracle's own cap */
  readonly maxAllowedStaleness: number;

  /** Withdrawal batching period (> 0) */
  readonly epochSeconds: number;

  /** Exit fee in bps (≤ MAX_EXIT_FEE_BPS) */
  readonly exitFeeBps: number;

  /** Destination of `moveAssets`; the zero address until set */
  readonly liquidityRecipient: Address;
}

export interface VaultOptions {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly asset: FungibleToken;
  readonly oracle: PriceSource;
  readonly admin: Address;
  readonly operator: Address;
  readonly guardian: Address;
  readonly maxAllowedStaleness: number;
  readonly epochSeconds: number;
  readonly exitFeeBps?: number;
  readonly liquidityRecipient?: Address;
  readonly clock: Clock;
  readonly store: EventStore;
  readonly catalog?: EventCatalog;
}

// =============================================================================
// Counters & Views
// =============================================================================

/** Cumulative gross flows. Observability only, never used in pricing. */
export interface FlowCounters {
  readonly totalDeposited: bigint;
  readonly totalWithdrawn: bigint;
}

export interface VaultSummary {
  readonly address: Address;
  readonly asset: Address;
  readonly oracle: Address;
  readonly paused: boolean;
  readonly totalSupply: bigint;
  readonly assetBalance: bigint;
  readonly idleLiquidity: bigint;
  readonly accruedFees: bigint;
  readonly escrowedShares: bigint;
  readonly flows: FlowCounters;
  readonly config: VaultConfig;
  readonly pendingOracle: PendingOracleView | null;
}

export interface PendingOracleView {
  readonly newOracle: Address;
  readonly queuedAt: number;
  readonly readyAt: number;
}

// =============================================================================
// Withdrawal Requests
// =============================================================================

interface WithdrawalRequestBase {
  /** 1-based, monotonic, never reused */
  readonly id: number;
  readonly owner: Address;
  readonly receiver: Address;
  readonly sharesEscrow: bigint;
  readonly requestedAt: number;
  /** First epoch boundary strictly after requestedAt */
  readonly claimableAt: number;
}

export interface OpenWithdrawalRequest extends WithdrawalRequestBase {
  readonly closed: false;
  readonly status: "open";
}

export interface ClosedWithdrawalRequest extends WithdrawalRequestBase {
  readonly closed: true;
  readonly status: "claimed" | "cancelled";
  readonly closedAt: number;
}

export type WithdrawalRequest = OpenWithdrawalRequest | ClosedWithdrawalRequest;

// =============================================================================
// Error
// =============================================================================

export type VaultErrorCode =
  | "ZERO_AMOUNT"
  | "BAD_ADDRESS"
  | "ORACLE_INVALID"
  | "ORACLE_STALE"
  | "SLIPPAGE_TOO_HIGH"
  | "INSUFFICIENT_LIQUIDITY"
  | "INSUFFICIENT_SHARES"
  | "INVALID_REFERRER"
  | "REQUEST_NOT_FOUND"
  | "REQUEST_CLOSED"
  | "NOT_OWNER"
  | "NOT_CLAIMABLE"
  | "STALENESS_TOO_HIGH"
  | "FEE_TOO_HIGH"
  | "RESCUE_FORBIDDEN"
  | "NO_PENDING_ORACLE"
  | "ORACLE_TIMELOCKED";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}
