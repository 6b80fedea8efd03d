/**
 * @navledger/vault — NAV-priced share vault.
 */

export { NavVault } from "./nav-vault.js";

export { PricingEngine, effectiveStaleness, feeOnGross, feeOnNet } from "./pricing.js";
export type { PricingContext } from "./pricing.js";

export { ReferralRegistry } from "./referrals.js";
export type { ReferralBinding, ReferralDecision } from "./referrals.js";

export { WithdrawalQueue, nextEpochBoundary } from "./withdrawal-queue.js";

export { MAX_EXIT_FEE_BPS, MAX_UINT256, VaultError } from "./types.js";
export type {
  ClosedWithdrawalRequest,
  FlowCounters,
  OpenWithdrawalRequest,
  PendingOracleView,
  VaultConfig,
  VaultErrorCode,
  VaultOptions,
  VaultSummary,
  WithdrawalRequest,
} from "./types.js";
