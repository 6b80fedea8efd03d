/**
 * @navledger/ledger — Fixed-point math and fungible token ledgers.
 *
 * A pure TypeScript package with no runtime dependencies:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Rounding direction is explicit (mulDiv floors, mulDivUp ceils)
 * - Token transfers conserve supply
 */

// Token ledger
export { TokenLedger } from "./token-ledger.js";

// Fixed-point arithmetic
export {
  BPS_DENOMINATOR,
  PRICE_DECIMALS,
  pow10,
  mulDiv,
  mulDivUp,
  rescale,
  formatUnits,
} from "./fixed-point.js";

// Types
export type { FungibleToken, TokenMetadata, TokenErrorCode } from "./types.js";
export { TokenError } from "./types.js";
