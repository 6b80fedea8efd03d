/**
 * @navledger/ledger — In-process fungible token ledger.
 *
 * Tracks total supply, per-holder balances and per-(owner, spender)
 * allowances. Used for the vault's underlying asset and for vault shares.
 *
 * API surface:
 * - transfer() / approve() / transferFrom() — standard delegated-transfer semantics
 * - mint() / burn() — supply changes, only reachable by the code that owns the ledger
 * - spendAllowance() — consume an allowance without moving balances
 *
 * Invariant: totalSupply() === sum of all balances, after every call.
 */

import type { Address } from "@navledger/types";
import { isZeroAddress } from "@navledger/types";
import type { FungibleToken, TokenMetadata } from "./types.js";
import { TokenError } from "./types.js";

export class TokenLedger implements FungibleToken {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  private readonly _balances = new Map<Address, bigint>();
  private readonly _allowances = new Map<Address, Map<Address, bigint>>();
  private _totalSupply = 0n;

  constructor(metadata: TokenMetadata) {
    if (isZeroAddress(metadata.address)) {
      throw new TokenError("INVALID_ADDRESS", "Token address must not be the zero address");
    }
    if (!Number.isInteger(metadata.decimals) || metadata.decimals < 0) {
      throw new TokenError("INVALID_AMOUNT", `Decimals must be a non-negative integer, got: ${String(metadata.decimals)}`);
    }
    this.address = metadata.address;
    this.name = metadata.name;
    this.symbol = metadata.symbol;
    this.decimals = metadata.decimals;
  }

  // ─── Views ───────────────────────────────────────────────────────────

  totalSupply(): bigint {
    return this._totalSupply;
  }

  balanceOf(account: Address): bigint {
    return this._balances.get(account) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(owner)?.get(spender) ?? 0n;
  }

  /**
   * All holders with a non-zero balance.
   */
  holders(): readonly (readonly [Address, bigint])[] {
    return [...this._balances.entries()].filter(([, balance]) => balance > 0n);
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  transfer(caller: Address, to: Address, amount: bigint): void {
    this._move(caller, to, amount);
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this._assertAddress(caller, "owner");
    this._assertAddress(spender, "spender");
    this._assertAmount(amount);

    let spenders = this._allowances.get(caller);
    if (spenders === undefined) {
      spenders = new Map();
      this._allowances.set(caller, spenders);
    }
    spenders.set(spender, amount);
  }

  /**
   * Move `amount` from `from` to `to` on the authority of `caller`.
   * When caller !== from the caller's allowance is consumed first.
   */
  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this._assertAmount(amount);
    // Validate the move before touching the allowance so a failure changes nothing.
    this._assertMovable(from, to, amount);
    if (caller !== from) {
      this.spendAllowance(from, caller, amount);
    }
    this._move(from, to, amount);
  }

  /**
   * Consume `amount` of the allowance `owner` granted to `spender`.
   */
  spendAllowance(owner: Address, spender: Address, amount: bigint): void {
    this._assertAmount(amount);
    const current = this.allowance(owner, spender);
    if (current < amount) {
      throw new TokenError(
        "INSUFFICIENT_ALLOWANCE",
        `${this.symbol}: allowance of ${spender} from ${owner} is ${current.toString()}, needs ${amount.toString()}`,
      );
    }
    this._allowances.get(owner)?.set(spender, current - amount);
  }

  // ─── Supply ──────────────────────────────────────────────────────────

  mint(to: Address, amount: bigint): void {
    this._assertAddress(to, "recipient");
    this._assertAmount(amount);
    this._balances.set(to, this.balanceOf(to) + amount);
    this._totalSupply += amount;
  }

  burn(from: Address, amount: bigint): void {
    this._assertAddress(from, "holder");
    this._assertAmount(amount);
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new TokenError(
        "INSUFFICIENT_BALANCE",
        `${this.symbol}: cannot burn ${amount.toString()} from ${from}, balance is ${balance.toString()}`,
      );
    }
    this._balances.set(from, balance - amount);
    this._totalSupply -= amount;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _move(from: Address, to: Address, amount: bigint): void {
    this._assertAmount(amount);
    this._assertMovable(from, to, amount);
    this._balances.set(from, this.balanceOf(from) - amount);
    this._balances.set(to, this.balanceOf(to) + amount);
  }

  private _assertMovable(from: Address, to: Address, amount: bigint): void {
    this._assertAddress(from, "sender");
    this._assertAddress(to, "recipient");
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new TokenError(
        "INSUFFICIENT_BALANCE",
        `${this.symbol}: balance of ${from} is ${balance.toString()}, needs ${amount.toString()}`,
      );
    }
  }

  private _assertAddress(address: Address, role: string): void {
    if (isZeroAddress(address)) {
      throw new TokenError("INVALID_ADDRESS", `${this.symbol}: ${role} must not be the zero address`);
    }
  }

  private _assertAmount(amount: bigint): void {
    if (amount < 0n) {
      throw new TokenError("INVALID_AMOUNT", `${this.symbol}: amount must be non-negative, got ${amount.toString()}`);
    }
  }
}
