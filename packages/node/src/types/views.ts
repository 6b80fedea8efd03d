/**
 * Response views. JSON has no bigint, so every amount leaves as a
 * decimal string of base units.
 */

import { PRICE_DECIMALS, formatUnits } from "@navledger/ledger";
import type { NavOracle } from "@navledger/oracle";
import type { VaultSummary, WithdrawalRequest } from "@navledger/vault";

export interface OracleView {
  readonly address: string;
  readonly price: string;
  /** `price` as a decimal, 1.0 at par */
  readonly nav: string;
  readonly updatedAt: number;
  readonly valid: boolean;
  readonly paused: boolean;
  readonly maxStalenessSeconds: number;
  readonly maxMoveBps: number;
  readonly current: boolean;
}

export function toOracleView(oracle: NavOracle, current: boolean): OracleView {
  const { price, updatedAt } = oracle.getPrice();
  const config = oracle.config();
  return {
    address: oracle.address,
    price: price.toString(),
    nav: formatUnits(price, PRICE_DECIMALS),
    updatedAt,
    valid: oracle.isValid(),
    paused: oracle.paused,
    maxStalenessSeconds: config.maxStalenessSeconds,
    maxMoveBps: config.maxMoveBps,
    current,
  };
}

export function toSummaryView(summary: VaultSummary) {
  return {
    address: summary.address,
    asset: summary.asset,
    oracle: summary.oracle,
    paused: summary.paused,
    totalSupply: summary.totalSupply.toString(),
    assetBalance: summary.assetBalance.toString(),
    idleLiquidity: summary.idleLiquidity.toString(),
    accruedFees: summary.accruedFees.toString(),
    escrowedShares: summary.escrowedShares.toString(),
    flows: {
      totalDeposited: summary.flows.totalDeposited.toString(),
      totalWithdrawn: summary.flows.totalWithdrawn.toString(),
    },
    config: summary.config,
    pendingOracle: summary.pendingOracle,
  };
}

export function toRequestView(request: WithdrawalRequest) {
  return {
    id: request.id,
    owner: request.owner,
    receiver: request.receiver,
    shares: request.sharesEscrow.toString(),
    requestedAt: request.requestedAt,
    claimableAt: request.claimableAt,
    status: request.status,
    closedAt: request.closed ? request.closedAt : null,
  };
}
