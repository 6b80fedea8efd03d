/**
 * @navledger/ledger — Token ledger types.
 *
 * Rules:
 * - Balances and allowances are non-negative bigint base units
 * - Transfers conserve total supply
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@navledger/types";

// ─── Fungible Token ──────────────────────────────────────────────────────

/**
 * Standard fungible-token surface (balance, transfer, allowance).
 *
 * `caller` is always the principal on whose authority the call is made.
 */
export interface FungibleToken {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  totalSupply(): bigint;
  balanceOf(account: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;

  transfer(caller: Address, to: Address, amount: bigint): void;
  approve(caller: Address, spender: Address, amount: bigint): void;
  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void;
}

/**
 * Identity of a token ledger.
 */
export interface TokenMetadata {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type TokenErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT";

/**
 * Structured error from a token ledger.
 */
export class TokenError extends Error {
  public readonly code: TokenErrorCode;

  constructor(code: TokenErrorCode, message: string) {
    super(message);
    this.name = "TokenError";
    this.code = code;
  }
}
