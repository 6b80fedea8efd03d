/**
 * NAV Vault — share-accounting ledger priced by an external NAV oracle.
 *
 * Composes:
 * - TokenLedger (vault shares, decimals = asset decimals)
 * - PricingEngine (validated oracle quote per call)
 * - WithdrawalQueue (epoch-batched escrow)
 * - ReferralRegistry (write-once attribution)
 * - AccessControl / PauseSwitch / ReentrancyGuard (authority)
 * - EventRecorder (one event batch per successful operation)
 *
 * Every mutating method runs inside `_mutate()`: a nested mutating call
 * fails with REENTRANT_CALL, and events are appended only if the method
 * returns. Each method performs all of its checks before its first token
 * movement, so a failure leaves balances, escrow and the log untouched.
 */

import type { Address, Clock } from "@navledger/types";
import { ZERO_ADDRESS, isZeroAddress } from "@navledger/types";
import { TokenLedger } from "@navledger/ledger";
import type { FungibleToken } from "@navledger/ledger";
import {
  AccessControl,
  ORACLE_TIMELOCK_SECONDS,
  PauseSwitch,
  ROLES,
  ReentrancyGuard,
  evaluateTimelock,
  readyAt,
} from "@navledger/authority";
import type { PendingChange, Role } from "@navledger/authority";
import { EventRecorder } from "@navledger/event-store";
import type { EventEmitter, NavEventPayloads } from "@navledger/event-store";
import type { NavSnapshot, PriceSource } from "@navledger/oracle";
import { PricingEngine, feeOnGross, feeOnNet } from "./pricing.js";
import type { ReferralDecision } from "./referrals.js";
import { ReferralRegistry } from "./referrals.js";
import { WithdrawalQueue } from "./withdrawal-queue.js";
import type {
  FlowCounters,
  PendingOracleView,
  VaultConfig,
  VaultOptions,
  VaultSummary,
  WithdrawalRequest,
} from "./types.js";
import { MAX_EXIT_FEE_BPS, MAX_UINT256, VaultError } from "./types.js";

type Events = EventEmitter<NavEventPayloads>;

/** Amounts of one payout, all in asset base units except `shares`. */
interface Payout {
  readonly shares: bigint;
  readonly gross: bigint;
  readonly fee: bigint;
  readonly net: bigint;
}

export class NavVault implements FungibleToken {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly asset: FungibleToken;

  private readonly _shares: TokenLedger;
  private readonly _clock: Clock;
  private readonly _access: AccessControl;
  private readonly _pause = new PauseSwitch();
  private readonly _guard = new ReentrancyGuard();
  private readonly _recorder: EventRecorder<NavEventPayloads>;
  private readonly _queue = new WithdrawalQueue();
  private readonly _referrals = new ReferralRegistry();

  private _oracle: PriceSource;
  private _config: VaultConfig;
  private _pendingOracle: PendingChange<PriceSource> | undefined;
  private _accruedFees = 0n;
  private _flows: FlowCounters = { totalDeposited: 0n, totalWithdrawn: 0n };

  constructor(options: VaultOptions) {
    const required: readonly (readonly [string, Address])[] = [
      ["vault", options.address],
      ["asset", options.asset.address],
      ["oracle", options.oracle.address],
      ["admin", options.admin],
      ["operator", options.operator],
      ["guardian", options.guardian],
    ];
    for (const [label, address] of required) {
      assertAddress(address, label);
    }
    assertEpoch(options.epochSeconds);
    assertStaleness(options.maxAllowedStaleness, options.oracle);
    const exitFeeBps = options.exitFeeBps ?? 0;
    assertExitFee(exitFeeBps);

    this.address = options.address;
    this.name = options.name;
    this.symbol = options.symbol;
    this.decimals = options.asset.decimals;
    this.asset = options.asset;
    this._oracle = options.oracle;
    this._clock = options.clock;
    this._config = {
      maxAllowedStaleness: options.maxAllowedStaleness,
      epochSeconds: options.epochSeconds,
      exitFeeBps,
      liquidityRecipient: options.liquidityRecipient ?? ZERO_ADDRESS,
    };
    this._shares = new TokenLedger({
      address: options.address,
      name: options.name,
      symbol: options.symbol,
      decimals: options.asset.decimals,
    });
    this._access = new AccessControl([
      [ROLES.DEFAULT_ADMIN, options.admin],
      [ROLES.OPERATOR, options.operator],
      [ROLES.GUARDIAN, options.guardian],
    ]);
    this._recorder = new EventRecorder<NavEventPayloads>({
      store: options.store,
      streamId: `vault:${options.address}`,
      source: "vault",
      clock: options.clock,
      catalog: options.catalog,
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Share token
  // ───────────────────────────────────────────────────────────────────────

  totalSupply(): bigint {
    return this._shares.totalSupply();
  }

  balanceOf(account: Address): bigint {
    return this._shares.balanceOf(account);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._shares.allowance(owner, spender);
  }

  transfer(caller: Address, to: Address, amount: bigint): void {
    this._mutate(caller, (events) => {
      this._assertShareHolder(to, "recipient");
      this._shares.transfer(caller, to, amount);
      events.emit("vault.shares.transferred", { from: caller, to, amount: amount.toString() });
    });
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this._mutate(caller, (events) => {
      this._shares.approve(caller, spender, amount);
      events.emit("vault.shares.approved", { owner: caller, spender, amount: amount.toString() });
    });
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this._mutate(caller, (events) => {
      this._assertShareHolder(to, "recipient");
      this._shares.transferFrom(caller, from, to, amount);
      events.emit("vault.shares.transferred", { from, to, amount: amount.toString() });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Pricing views (every one re-validates the oracle)
  // ───────────────────────────────────────────────────────────────────────

  /** Current NAV of all shares; 0 with no supply, without consulting the oracle. */
  totalAssets(): bigint {
    const supply = this._shares.totalSupply();
    return supply === 0n ? 0n : this._quote().sharesToAssets(supply);
  }

  /** NAV per share in asset base units. */
  pricePerShare(): bigint {
    return this._quote().pricePerShare;
  }

  convertToShares(assets: bigint): bigint {
    return this._quote().assetsToShares(assets);
  }

  convertToAssets(shares: bigint): bigint {
    return this._quote().sharesToAssets(shares);
  }

  previewDeposit(assets: bigint): bigint {
    return this._quote().assetsToShares(assets);
  }

  previewMint(shares: bigint): bigint {
    return this._quote().sharesToAssetsUp(shares);
  }

  /** Shares burned to pay out `assets` net of the exit fee. */
  previewWithdraw(assets: bigint): bigint {
    return this._withdrawPayout(this._quote(), assets).shares;
  }

  /** Net assets paid for `shares` after the exit fee. */
  previewRedeem(shares: bigint): bigint {
    return this._redeemPayout(this._quote(), shares).net;
  }

  maxDeposit(_receiver: Address): bigint {
    return this._pause.paused ? 0n : MAX_UINT256;
  }

  maxMint(_receiver: Address): bigint {
    return this._pause.paused ? 0n : MAX_UINT256;
  }

  /** Liquidity is checked at execution, not reflected here. */
  maxWithdraw(owner: Address): bigint {
    return this._pause.paused ? 0n : this.previewRedeem(this._shares.balanceOf(owner));
  }

  maxRedeem(owner: Address): bigint {
    return this._pause.paused ? 0n : this._shares.balanceOf(owner);
  }

  // ───────────────────────────────────────────────────────────────────────
  // State views
  // ───────────────────────────────────────────────────────────────────────

  get oracle(): PriceSource {
    return this._oracle;
  }

  /** The raw oracle snapshot, unvalidated. */
  oracleSnapshot(): NavSnapshot {
    return this._oracle.getPrice();
  }

  get paused(): boolean {
    return this._pause.paused;
  }

  get streamId(): string {
    return this._recorder.streamId;
  }

  config(): VaultConfig {
    return this._config;
  }

  flowCounters(): FlowCounters {
    return this._flows;
  }

  accruedFees(): bigint {
    return this._accruedFees;
  }

  /** Asset balance not reserved for accrued fees. */
  idleLiquidity(): bigint {
    const balance = this.asset.balanceOf(this.address);
    return balance > this._accruedFees ? balance - this._accruedFees : 0n;
  }

  referrerOf(user: Address): Address {
    return this._referrals.referrerOf(user);
  }

  withdrawalRequest(id: number): WithdrawalRequest | undefined {
    return this._queue.get(id);
  }

  allRequestsOf(owner: Address): readonly number[] {
    return this._queue.requestsOf(owner);
  }

  pendingOracleUpdate(): PendingOracleView | null {
    const pending = this._pendingOracle;
    if (pending === undefined) {
      return null;
    }
    return {
      newOracle: pending.target.address,
      queuedAt: pending.queuedAt,
      readyAt: readyAt(pending, ORACLE_TIMELOCK_SECONDS),
    };
  }

  hasRole(role: Role, account: Address): boolean {
    return this._access.hasRole(role, account);
  }

  summary(): VaultSummary {
    return {
      address: this.address,
      asset: this.asset.address,
      oracle: this._oracle.address,
      paused: this._pause.paused,
      totalSupply: this._shares.totalSupply(),
      assetBalance: this.asset.balanceOf(this.address),
      idleLiquidity: this.idleLiquidity(),
      accruedFees: this._accruedFees,
      escrowedShares: this._queue.escrowed,
      flows: this._flows,
      config: this._config,
      pendingOracle: this.pendingOracleUpdate(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposits
  // ───────────────────────────────────────────────────────────────────────

  /** @returns shares minted to `receiver` */
  deposit(caller: Address, assets: bigint, receiver: Address): bigint {
    return this._mutate(caller, (events) => {
      this._pause.assertNotPaused();
      assertPositive(assets, "assets");
      this._assertShareHolder(receiver, "receiver");

      const shares = this._quote().assetsToShares(assets);
      assertPositive(shares, "shares");
      this._executeDeposit(events, caller, receiver, assets, shares);
      return shares;
    });
  }

  /** @returns assets pulled from `caller` */
  mint(caller: Address, shares: bigint, receiver: Address): bigint {
    return this._mutate(caller, (events) => {
      this._pause.assertNotPaused();
      assertPositive(shares, "shares");
      this._assertShareHolder(receiver, "receiver");

      const assets = this._quote().sharesToAssetsUp(shares);
      assertPositive(assets, "assets");
      this._executeDeposit(events, caller, receiver, assets, shares);
      return assets;
    });
  }

  /**
   * Deposit with a minimum share bound and optional referral binding.
   *
   * @throws VaultError SLIPPAGE_TOO_HIGH when fewer than `minShares` would be minted
   * @throws VaultError INVALID_REFERRER per ReferralRegistry.resolve
   */
  depositWithCheck(
    caller: Address,
    assets: bigint,
    receiver: Address,
    referrer: Address,
    minShares: bigint,
  ): bigint {
    return this._mutate(caller, (events) => {
      this._pause.assertNotPaused();
      assertPositive(assets, "assets");
      this._assertShareHolder(receiver, "receiver");
      const decision = this._referrals.resolve(caller, receiver, referrer);

      const shares = this._quote().assetsToShares(assets);
      assertPositive(shares, "shares");
      if (shares < minShares) {
        throw new VaultError(
          "SLIPPAGE_TOO_HIGH",
          `Deposit would mint ${shares.toString()} shares, below the minimum ${minShares.toString()}`,
        );
      }

      this._executeDeposit(events, caller, receiver, assets, shares);
      this._attribute(events, "vault.referral.deposit", caller, receiver, decision, assets, shares);
      return shares;
    });
  }

  /**
   * Mint with a maximum asset bound and optional referral binding.
   *
   * @throws VaultError SLIPPAGE_TOO_HIGH when more than `maxAssets` would be pulled
   */
  mintWithCheck(
    caller: Address,
    shares: bigint,
    receiver: Address,
    referrer: Address,
    maxAssets: bigint,
  ): bigint {
    return this._mutate(caller, (events) => {
      this._pause.assertNotPaused();
      assertPositive(shares, "shares");
      this._assertShareHolder(receiver, "receiver");
      const decision = this._referrals.resolve(caller, receiver, referrer);

      const assets = this._quote().sharesToAssetsUp(shares);
      assertPositive(assets, "assets");
      if (assets > maxAssets) {
        throw new VaultError(
          "SLIPPAGE_TOO_HIGH",
          `Mint would cost ${assets.toString()} assets, above the maximum ${maxAssets.toString()}`,
        );
      }

      this._executeDeposit(events, caller, receiver, assets, shares);
      this._attribute(events, "vault.referral.mint", caller, receiver, decision, assets, shares);
      return assets;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdrawals
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pay exactly `assets` to `receiver`, burning the fee-inclusive shares from `owner`.
   *
   * @returns shares burned
   */
  withdraw(caller: Address, assets: bigint, receiver: Address, owner: Address): bigint {
    return this._mutate(caller, (events) => {
      this._assertExit(assets, receiver, owner);
      const payout = this._withdrawPayout(this._quote(), assets);
      this._executeWithdraw(events, caller, receiver, owner, payout);
      return payout.shares;
    });
  }

  /**
   * Burn `shares` from `owner` and pay the net of fee to `receiver`.
   *
   * @returns net assets paid
   */
  redeem(caller: Address, shares: bigint, receiver: Address, owner: Address): bigint {
    return this._mutate(caller, (events) => {
      this._assertExit(shares, receiver, owner);
      const payout = this._redeemPayout(this._quote(), shares);
      assertPositive(payout.net, "assets");
      this._executeWithdraw(events, caller, receiver, owner, payout);
      return payout.net;
    });
  }

  withdrawWithCheck(
    caller: Address,
    assets: bigint,
    receiver: Address,
    owner: Address,
    maxShares: bigint,
  ): bigint {
    return this._mutate(caller, (events) => {
      this._assertExit(assets, receiver, owner);
      const payout = this._withdrawPayout(this._quote(), assets);
      if (payout.shares > maxShares) {
        throw new VaultError(
          "SLIPPAGE_TOO_HIGH",
          `Withdraw would burn ${payout.shares.toString()} shares, above the maximum ${maxShares.toString()}`,
        );
      }
      this._executeWithdraw(events, caller, receiver, owner, payout);
      return payout.shares;
    });
  }

  redeemWithCheck(
    caller: Address,
    shares: bigint,
    receiver: Address,
    owner: Address,
    minAssets: bigint,
  ): bigint {
    return this._mutate(caller, (events) => {
      this._assertExit(shares, receiver, owner);
      const payout = this._redeemPayout(this._quote(), shares);
      assertPositive(payout.net, "assets");
      if (payout.net < minAssets) {
        throw new VaultError(
          "SLIPPAGE_TOO_HIGH",
          `Redeem would pay ${payout.net.toString()} assets, below the minimum ${minAssets.toString()}`,
        );
      }
      this._executeWithdraw(events, caller, receiver, owner, payout);
      return payout.net;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdrawal queue
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Escrow `shares` from the caller until the next epoch boundary.
   *
   * @returns the request ID
   */
  queueWithdrawal(caller: Address, shares: bigint, receiver: Address): number {
    return this._mutate(caller, (events) => {
      this._pause.assertNotPaused();
      assertPositive(shares, "shares");
      assertAddress(receiver, "receiver");
      this._assertShares(caller, shares);

      this._shares.transfer(caller, this.address, shares);
      const request = this._queue.enqueue(caller, receiver, shares, this._clock.now(), this._config.epochSeconds);

      events.emit("vault.withdrawal.queued", {
        id: request.id,
        owner: caller,
        receiver,
        shares: shares.toString(),
        claimableAt: request.claimableAt,
      });
      return request.id;
    });
  }

  /**
   * Burn the escrow at the claim-time price and pay the receiver, all or nothing.
   *
   * @returns net assets paid
   */
  claimWithdrawal(caller: Address, id: number): bigint {
    return this._mutate(caller, (events) => {
      this._pause.assertNotPaused();
      const now = this._clock.now();
      const request = this._queue.assertClaimable(caller, id, now);

      const payout = this._redeemPayout(this._quote(), request.sharesEscrow);
      assertPositive(payout.net, "assets");
      this._assertLiquidity(payout.net);

      this._shares.burn(this.address, request.sharesEscrow);
      this.asset.transfer(this.address, request.receiver, payout.net);
      this._queue.close(request, "claimed", now);

      events.emit("vault.withdrawal.claimed", {
        id,
        owner: request.owner,
        receiver: request.receiver,
        shares: request.sharesEscrow.toString(),
        assets: payout.net.toString(),
        fee: payout.fee.toString(),
      });
      this._accrueFee(events, payout.fee);
      this._countWithdrawal(events, payout.gross);
      return payout.net;
    });
  }

  /** Return the escrow to its owner. Allowed while paused. */
  cancelWithdrawal(caller: Address, id: number): void {
    this._mutate(caller, (events) => {
      const request = this._queue.assertCancellable(caller, id);

      this._shares.transfer(this.address, request.owner, request.sharesEscrow);
      this._queue.close(request, "cancelled", this._clock.now());

      events.emit("vault.withdrawal.cancelled", {
        id,
        owner: request.owner,
        shares: request.sharesEscrow.toString(),
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Liquidity & fees
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Move idle assets to the liquidity recipient.
   * Only accrued fees are held back; queued withdrawals are not.
   */
  moveAssets(caller: Address, amount: bigint): void {
    this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.OPERATOR, caller);
      assertPositive(amount, "amount");
      const to = this._config.liquidityRecipient;
      if (isZeroAddress(to)) {
        throw new VaultError("BAD_ADDRESS", "Liquidity recipient is not set");
      }
      this._assertLiquidity(amount);

      this.asset.transfer(this.address, to, amount);
      events.emit("vault.liquidity.moved", { to, amount: amount.toString() });
    });
  }

  /** Top up the vault's assets without minting shares. Open to anyone. */
  fundLiquidity(caller: Address, amount: bigint): void {
    this._mutate(caller, (events) => {
      assertPositive(amount, "amount");
      this.asset.transferFrom(this.address, caller, this.address, amount);
      events.emit("vault.liquidity.funded", { from: caller, amount: amount.toString() });
    });
  }

  /**
   * Pay out accrued fees, bounded by the vault's asset balance.
   *
   * @returns amount swept
   */
  sweepExitFees(caller: Address, to: Address): bigint {
    return this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.DEFAULT_ADMIN, caller);
      assertAddress(to, "fee recipient");
      const balance = this.asset.balanceOf(this.address);
      const amount = this._accruedFees < balance ? this._accruedFees : balance;
      assertPositive(amount, "swept fees");

      this.asset.transfer(this.address, to, amount);
      this._accruedFees -= amount;
      events.emit("vault.fee.swept", { to, amount: amount.toString() });
      return amount;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Configuration
  // ───────────────────────────────────────────────────────────────────────

  setMaxAllowedStaleness(caller: Address, seconds: number): void {
    this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.OPERATOR, caller);
      assertStaleness(seconds, this._oracle);
      this._config = { ...this._config, maxAllowedStaleness: seconds };
      events.emit("vault.config.staleness", { maxAllowedStaleness: seconds });
    });
  }

  setEpochSeconds(caller: Address, seconds: number): void {
    this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.DEFAULT_ADMIN, caller);
      assertEpoch(seconds);
      this._config = { ...this._config, epochSeconds: seconds };
      events.emit("vault.config.epoch", { epochSeconds: seconds });
    });
  }

  setExitFeeBps(caller: Address, bps: number): void {
    this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.DEFAULT_ADMIN, caller);
      assertExitFee(bps);
      this._config = { ...this._config, exitFeeBps: bps };
      events.emit("vault.config.exit_fee", { exitFeeBps: bps });
    });
  }

  setLiquidityRecipient(caller: Address, recipient: Address): void {
    this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.DEFAULT_ADMIN, caller);
      assertAddress(recipient, "liquidity recipient");
      this._config = { ...this._config, liquidityRecipient: recipient };
      events.emit("vault.config.liquidity_recipient", { liquidityRecipient: recipient });
    });
  }

  pause(caller: Address): void {
    this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.GUARDIAN, caller);
      this._pause.pause();
      events.emit("vault.paused", { account: caller });
    });
  }

  unpause(caller: Address): void {
    this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.GUARDIAN, caller);
      this._pause.unpause();
      events.emit("vault.unpaused", { account: caller });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Oracle replacement (two-phase, timelocked)
  // ───────────────────────────────────────────────────────────────────────

  /** Queue `newOracle`; re-queueing replaces the pending change and restarts the delay. */
  queueOracleUpdate(caller: Address, newOracle: PriceSource | undefined): PendingOracleView {
    return this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.DEFAULT_ADMIN, caller);
      if (newOracle === undefined || isZeroAddress(newOracle.address)) {
        throw new VaultError("BAD_ADDRESS", "New oracle must not be the zero address");
      }

      const pending = { target: newOracle, queuedAt: this._clock.now() };
      this._pendingOracle = pending;
      const view: PendingOracleView = {
        newOracle: newOracle.address,
        queuedAt: pending.queuedAt,
        readyAt: readyAt(pending, ORACLE_TIMELOCK_SECONDS),
      };
      events.emit("vault.oracle.queued", { ...view });
      return view;
    });
  }

  cancelOracleUpdate(caller: Address): void {
    this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.DEFAULT_ADMIN, caller);
      const pending = this._pendingOracle;
      if (pending === undefined) {
        throw new VaultError("NO_PENDING_ORACLE", "No oracle update is queued");
      }
      this._pendingOracle = undefined;
      events.emit("vault.oracle.cancelled", { newOracle: pending.target.address });
    });
  }

  /** @returns the new oracle's address */
  executeOracleUpdate(caller: Address): Address {
    return this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.DEFAULT_ADMIN, caller);
      const decision = evaluateTimelock(this._pendingOracle, this._clock.now(), ORACLE_TIMELOCK_SECONDS);
      if (!decision.ready) {
        if (decision.reason === "NOTHING_PENDING") {
          throw new VaultError("NO_PENDING_ORACLE", "No oracle update is queued");
        }
        throw new VaultError("ORACLE_TIMELOCKED", `Oracle update is timelocked until ${decision.readyAt}`);
      }

      const previous = this._oracle;
      this._oracle = decision.target;
      this._pendingOracle = undefined;
      events.emit("vault.oracle.changed", {
        previousOracle: previous.address,
        newOracle: decision.target.address,
      });
      return decision.target.address;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Rescue & roles
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Recover a foreign token sent to the vault. The managed asset and the
   * vault's own shares are never rescuable.
   */
  rescueToken(caller: Address, token: FungibleToken, to: Address, amount: bigint): void {
    this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.DEFAULT_ADMIN, caller);
      if (token.address === this.asset.address || token.address === this.address) {
        throw new VaultError("RESCUE_FORBIDDEN", `Token ${token.address} is managed by the vault`);
      }
      assertAddress(to, "recipient");
      assertPositive(amount, "amount");

      token.transfer(this.address, to, amount);
      events.emit("vault.token.rescued", { token: token.address, to, amount: amount.toString() });
    });
  }

  grantRole(caller: Address, role: Role, account: Address): boolean {
    return this._mutate(caller, (events) => {
      const changed = this._access.grantRole(caller, role, account);
      if (changed) {
        events.emit("vault.role.granted", { role, account, sender: caller });
      }
      return changed;
    });
  }

  revokeRole(caller: Address, role: Role, account: Address): boolean {
    return this._mutate(caller, (events) => {
      const changed = this._access.revokeRole(caller, role, account);
      if (changed) {
        events.emit("vault.role.revoked", { role, account, sender: caller });
      }
      return changed;
    });
  }

  renounceRole(caller: Address, role: Role): boolean {
    return this._mutate(caller, (events) => {
      const changed = this._access.renounceRole(caller, role);
      if (changed) {
        events.emit("vault.role.revoked", { role, account: caller, sender: caller });
      }
      return changed;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _mutate<T>(caller: Address, body: (events: Events) => T): T {
    return this._guard.run(() => this._recorder.record(caller, body));
  }

  private _quote(): PricingEngine {
    return PricingEngine.quote({
      oracle: this._oracle,
      maxAllowedStaleness: this._config.maxAllowedStaleness,
      now: this._clock.now(),
      assetDecimals: this.decimals,
    });
  }

  private _withdrawPayout(quote: PricingEngine, net: bigint): Payout {
    const fee = feeOnNet(net, this._config.exitFeeBps);
    const gross = net + fee;
    return { shares: quote.assetsToSharesUp(gross), gross, fee, net };
  }

  private _redeemPayout(quote: PricingEngine, shares: bigint): Payout {
    const gross = quote.sharesToAssets(shares);
    const fee = feeOnGross(gross, this._config.exitFeeBps);
    return { shares, gross, fee, net: gross - fee };
  }

  private _assertExit(amount: bigint, receiver: Address, owner: Address): void {
    this._pause.assertNotPaused();
    assertPositive(amount, "amount");
    assertAddress(receiver, "receiver");
    assertAddress(owner, "owner");
  }

  /** Shares held by the vault itself are escrow only. */
  private _assertShareHolder(account: Address, label: string): void {
    assertAddress(account, label);
    if (account === this.address) {
      throw new VaultError("BAD_ADDRESS", `${label} must not be the vault itself`);
    }
  }

  private _assertShares(owner: Address, shares: bigint): void {
    const balance = this._shares.balanceOf(owner);
    if (balance < shares) {
      throw new VaultError(
        "INSUFFICIENT_SHARES",
        `${owner} holds ${balance.toString()} shares, needs ${shares.toString()}`,
      );
    }
  }

  private _assertLiquidity(amount: bigint): void {
    const idle = this.idleLiquidity();
    if (amount > idle) {
      throw new VaultError(
        "INSUFFICIENT_LIQUIDITY",
        `Vault has ${idle.toString()} idle assets, needs ${amount.toString()}`,
      );
    }
  }

  private _executeDeposit(events: Events, caller: Address, receiver: Address, assets: bigint, shares: bigint): void {
    this.asset.transferFrom(this.address, caller, this.address, assets);
    this._shares.mint(receiver, shares);

    events.emit("vault.deposited", {
      caller,
      receiver,
      assets: assets.toString(),
      shares: shares.toString(),
    });
    this._flows = { ...this._flows, totalDeposited: this._flows.totalDeposited + assets };
    this._emitFlows(events);
  }

  private _executeWithdraw(events: Events, caller: Address, receiver: Address, owner: Address, payout: Payout): void {
    this._assertShares(owner, payout.shares);
    this._assertLiquidity(payout.net);
    if (caller !== owner) {
      this._shares.spendAllowance(owner, caller, payout.shares);
    }
    this._shares.burn(owner, payout.shares);
    this.asset.transfer(this.address, receiver, payout.net);

    events.emit("vault.withdrawn", {
      caller,
      receiver,
      owner,
      assets: payout.net.toString(),
      shares: payout.shares.toString(),
      fee: payout.fee.toString(),
    });
    this._accrueFee(events, payout.fee);
    this._countWithdrawal(events, payout.gross);
  }

  private _accrueFee(events: Events, fee: bigint): void {
    if (fee === 0n) {
      return;
    }
    this._accruedFees += fee;
    events.emit("vault.fee.accrued", { amount: fee.toString(), accruedFees: this._accruedFees.toString() });
  }

  private _countWithdrawal(events: Events, gross: bigint): void {
    this._flows = { ...this._flows, totalWithdrawn: this._flows.totalWithdrawn + gross };
    this._emitFlows(events);
  }

  private _emitFlows(events: Events): void {
    events.emit("vault.flow.updated", {
      totalDeposited: this._flows.totalDeposited.toString(),
      totalWithdrawn: this._flows.totalWithdrawn.toString(),
    });
  }

  private _attribute(
    events: Events,
    type: "vault.referral.deposit" | "vault.referral.mint",
    payer: Address,
    receiver: Address,
    decision: ReferralDecision,
    assets: bigint,
    shares: bigint,
  ): void {
    if (decision.action === "none") {
      return;
    }
    if (this._referrals.commit(receiver, decision)) {
      events.emit("vault.referrer.set", { user: receiver, referrer: decision.referrer });
    }
    events.emit(type, {
      payer,
      receiver,
      referrer: decision.referrer,
      assets: assets.toString(),
      shares: shares.toString(),
    });
  }
}

// ─── Guards ──────────────────────────────────────────────────────────────

function assertPositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new VaultError("ZERO_AMOUNT", `${label} must be greater than zero`);
  }
}

function assertAddress(address: Address, label: string): void {
  if (isZeroAddress(address)) {
    throw new VaultError("BAD_ADDRESS", `${label} must not be the zero address`);
  }
}

function assertEpoch(seconds: number): void {
  if (!Number.isSafeInteger(seconds) || seconds <= 0) {
    throw new VaultError("ZERO_AMOUNT", `epochSeconds must be a positive integer, got ${seconds}`);
  }
}

function assertStaleness(seconds: number, oracle: PriceSource): void {
  if (!Number.isSafeInteger(seconds) || seconds <= 0) {
    throw new VaultError("ZERO_AMOUNT", `maxAllowedStaleness must be a positive integer, got ${seconds}`);
  }
  const cap = oracle.maxOracleStaleness();
  if (seconds > cap) {
    throw new VaultError("STALENESS_TOO_HIGH", `maxAllowedStaleness ${seconds} exceeds the oracle cap ${cap}`);
  }
}

function assertExitFee(bps: number): void {
  if (!Number.isSafeInteger(bps) || bps < 0 || bps > MAX_EXIT_FEE_BPS) {
    throw new VaultError("FEE_TOO_HIGH", `exitFeeBps must be between 0 and ${MAX_EXIT_FEE_BPS}, got ${bps}`);
  }
}
