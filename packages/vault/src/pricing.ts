/**
 * Pricing Engine — asset ⇄ share conversion at the oracle's NAV.
 *
 * A PricingEngine is a validated quote: building one re-checks the oracle
 * (invalid before stale) and rescales its 18-decimal price to the asset's
 * precision. Every vault operation and view builds a fresh one, so a stale
 * or paused feed makes reads fail as well as writes.
 *
 * Rounding is explicit per call and always favours the vault:
 * - shares out / assets out: floor
 * - shares in / assets in: ceil
 * - fees: ceil
 */

import { BPS_DENOMINATOR, PRICE_DECIMALS, mulDiv, mulDivUp, pow10, rescale } from "@navledger/ledger";
import type { PriceSource } from "@navledger/oracle";
import { VaultError } from "./types.js";

export interface PricingContext {
  readonly oracle: PriceSource;
  /** Vault-side window; the tighter of this and the oracle's cap applies */
  readonly maxAllowedStaleness: number;
  readonly now: number;
  readonly assetDecimals: number;
}

/**
 * min(vault window, oracle cap), read live.
 */
export function effectiveStaleness(maxAllowedStaleness: number, oracle: PriceSource): number {
  return Math.min(maxAllowedStaleness, oracle.maxOracleStaleness());
}

export class PricingEngine {
  /** NAV per share, in asset base units */
  readonly pricePerShare: bigint;

  /** 10^assetDecimals */
  readonly assetScale: bigint;

  private constructor(pricePerShare: bigint, assetScale: bigint) {
    this.pricePerShare = pricePerShare;
    this.assetScale = assetScale;
  }

  /**
   * @throws VaultError ORACLE_INVALID when unprimed, paused, or the rescaled price is 0
   * @throws VaultError ORACLE_STALE when now > updatedAt + effective window
   */
  static quote(ctx: PricingContext): PricingEngine {
    const { price, updatedAt } = ctx.oracle.getPrice();
    if (price === 0n || !ctx.oracle.isValid()) {
      throw new VaultError("ORACLE_INVALID", "Oracle price is unavailable or the oracle is paused");
    }

    const window = effectiveStaleness(ctx.maxAllowedStaleness, ctx.oracle);
    if (ctx.now > updatedAt + window) {
      throw new VaultError(
        "ORACLE_STALE",
        `Oracle price from ${updatedAt} is older than ${window}s at ${ctx.now}`,
      );
    }

    const pricePerShare = rescale(price, PRICE_DECIMALS, ctx.assetDecimals);
    if (pricePerShare === 0n) {
      throw new VaultError("ORACLE_INVALID", "Oracle price rounds to zero at the asset's precision");
    }

    return new PricingEngine(pricePerShare, pow10(ctx.assetDecimals));
  }

  /** floor(assets * scale / pps) */
  assetsToShares(assets: bigint): bigint {
    return mulDiv(assets, this.assetScale, this.pricePerShare);
  }

  /** ceil(assets * scale / pps) */
  assetsToSharesUp(assets: bigint): bigint {
    return mulDivUp(assets, this.assetScale, this.pricePerShare);
  }

  /** floor(shares * pps / scale) */
  sharesToAssets(shares: bigint): bigint {
    return mulDiv(shares, this.pricePerShare, this.assetScale);
  }

  /** ceil(shares * pps / scale) */
  sharesToAssetsUp(shares: bigint): bigint {
    return mulDivUp(shares, this.pricePerShare, this.assetScale);
  }
}

// ─── Exit fee ──────────────────────────────────────────────────────────

/**
 * Fee retained from a gross payout: ceil(gross * bps / 10000).
 */
export function feeOnGross(gross: bigint, feeBps: number): bigint {
  return mulDivUp(gross, BigInt(feeBps), BPS_DENOMINATOR);
}

/**
 * Fee to add on top of a requested net payout so that
 * gross - fee === net: ceil(net * bps / (10000 - bps)).
 */
export function feeOnNet(net: bigint, feeBps: number): bigint {
  const bps = BigInt(feeBps);
  return mulDivUp(net, bps, BPS_DENOMINATOR - bps);
}
