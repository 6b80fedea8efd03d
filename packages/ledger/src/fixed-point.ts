/**
 * @navledger/ledger — Deterministic fixed-point arithmetic.
 *
 * All arithmetic uses bigint. Decimal strings are converted to/from
 * base units via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Rounding direction is always explicit at the call site
 * - Inputs to mulDiv are non-negative
 */

import { TokenError } from "./types.js";

/** Basis-point denominator: 10_000 bps = 100%. */
export const BPS_DENOMINATOR = 10_000n;

/** Native precision of oracle prices. */
export const PRICE_DECIMALS = 18;

/**
 * 10^decimals as bigint.
 */
export function pow10(decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new TokenError("INVALID_AMOUNT", `Decimals must be a non-negative integer, got: ${String(decimals)}`);
  }
  return 10n ** BigInt(decimals);
}

function assertMulDivOperands(a: bigint, b: bigint, denominator: bigint): void {
  if (denominator <= 0n) {
    throw new RangeError(`mulDiv denominator must be positive, got ${denominator.toString()}`);
  }
  if (a < 0n || b < 0n) {
    throw new TokenError(
      "INVALID_AMOUNT",
      `Amounts must be non-negative, got ${a.toString()} and ${b.toString()}`,
    );
  }
}

/**
 * floor(a * b / denominator)
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  assertMulDivOperands(a, b, denominator);
  return (a * b) / denominator;
}

/**
 * ceil(a * b / denominator)
 */
export function mulDivUp(a: bigint, b: bigint, denominator: bigint): bigint {
  assertMulDivOperands(a, b, denominator);
  const product = a * b;
  const quotient = product / denominator;
  return product % denominator === 0n ? quotient : quotient + 1n;
}

/**
 * Move a value between decimal precisions.
 * Truncates when reducing precision, multiplies when increasing it.
 *
 * rescale(1_500000000000000000n, 18, 6) → 1_500000n
 */
export function rescale(value: bigint, fromDecimals: number, toDecimals: number): bigint {
  if (fromDecimals === toDecimals) {
    return value;
  }
  if (fromDecimals > toDecimals) {
    return value / pow10(fromDecimals - toDecimals);
  }
  return value * pow10(toDecimals - fromDecimals);
}

/**
 * Render base units as a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 */
export function formatUnits(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}
