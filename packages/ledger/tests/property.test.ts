/**
 * Property-Based Tests for @navledger/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Transfers conserve supply (sum of balances === totalSupply)
 * 2. mulDiv never exceeds the exact quotient; mulDivUp never falls below it
 * 3. formatUnits keeps every digit of x
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { TokenLedger } from "../src/token-ledger.js";
import { formatUnits, mulDiv, mulDivUp } from "../src/fixed-point.js";

// =============================================================================
// Arbitraries
// =============================================================================

const HOLDERS = ["0x01", "0x02", "0x03", "0x04"] as const;

const arbHolder = fc.constantFrom(...HOLDERS);

const arbTransfer = fc.record({
  from: arbHolder,
  to: arbHolder,
  amount: fc.bigInt({ min: 0n, max: 2_000n }),
});

const arbUint = fc.bigInt({ min: 0n, max: 10n ** 30n });
const arbPositive = fc.bigInt({ min: 1n, max: 10n ** 24n });

// =============================================================================
// Properties
// =============================================================================

describe("supply conservation", () => {
  it("sum of balances equals total supply after any transfer sequence", () => {
    fc.assert(
      fc.property(fc.array(arbTransfer, { maxLength: 40 }), (transfers) => {
        const token = new TokenLedger({ address: "0x7e57", name: "T", symbol: "T", decimals: 6 });
        for (const holder of HOLDERS) {
          token.mint(holder, 1_000n);
        }

        for (const t of transfers) {
          if (token.balanceOf(t.from) >= t.amount) {
            token.transfer(t.from, t.to, t.amount);
          }
        }

        const sum = token.holders().reduce((acc, [, balance]) => acc + balance, 0n);
        expect(sum).toBe(token.totalSupply());
        expect(token.totalSupply()).toBe(4_000n);
      }),
    );
  });
});

describe("rounding direction", () => {
  it("mulDiv * d <= a * b < (mulDiv + 1) * d", () => {
    fc.assert(
      fc.property(arbUint, arbUint, arbPositive, (a, b, d) => {
        const q = mulDiv(a, b, d);
        expect(q * d <= a * b).toBe(true);
        expect(a * b < (q + 1n) * d).toBe(true);
      }),
    );
  });

  it("mulDivUp is mulDiv, plus one only when inexact", () => {
    fc.assert(
      fc.property(arbUint, arbUint, arbPositive, (a, b, d) => {
        const exact = (a * b) % d === 0n;
        expect(mulDivUp(a, b, d)).toBe(mulDiv(a, b, d) + (exact ? 0n : 1n));
      }),
    );
  });
});

describe("unit formatting", () => {
  it("drops no digits", () => {
    fc.assert(
      fc.property(arbUint, fc.integer({ min: 0, max: 18 }), (value, decimals) => {
        expect(BigInt(formatUnits(value, decimals).replace(".", ""))).toBe(value);
      }),
    );
  });
});
