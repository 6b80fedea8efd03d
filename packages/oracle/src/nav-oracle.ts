/**
 * NAV Oracle — guarded single-writer price feed.
 *
 * Accepts `(price, timestamp)` reports from the reporter role and rejects
 * reports that are zero, stale, or move too far from the previous price.
 * The guardian can pause the feed, which makes `isValid()` false for
 * every consumer regardless of how fresh the last report is.
 *
 * Rules:
 * - Reports may be dated slightly in the future; only the trailing
 *   staleness window is enforced
 * - The first report is exempt from the move-size guard
 * - A move exactly at the bps boundary is accepted
 * - Every mutation emits at least one event, committed only on success
 */

import type { Address, Clock } from "@navledger/types";
import { isZeroAddress } from "@navledger/types";
import { AccessControl, PauseSwitch, ReentrancyGuard, ROLES } from "@navledger/authority";
import type { Role } from "@navledger/authority";
import { EventRecorder } from "@navledger/event-store";
import type { EventCatalog, EventEmitter, EventStore, NavEventPayloads } from "@navledger/event-store";
import { BPS_DENOMINATOR } from "@navledger/ledger";
import type { NavSnapshot, OracleConfig, PriceSource } from "./types.js";
import { OracleError } from "./types.js";

export interface NavOracleOptions {
  readonly address: Address;
  readonly admin: Address;
  readonly reporter: Address;
  readonly guardian: Address;
  readonly maxStalenessSeconds: number;
  readonly maxMoveBps: number;
  readonly clock: Clock;
  readonly store: EventStore;
  readonly catalog?: EventCatalog;
}

type Events = EventEmitter<NavEventPayloads>;

export class NavOracle implements PriceSource {
  readonly address: Address;

  private readonly _clock: Clock;
  private readonly _access: AccessControl;
  private readonly _pause = new PauseSwitch();
  private readonly _guard = new ReentrancyGuard();
  private readonly _recorder: EventRecorder<NavEventPayloads>;
  private _config: OracleConfig;
  private _snapshot: NavSnapshot = { price: 0n, updatedAt: 0 };

  constructor(options: NavOracleOptions) {
    if (isZeroAddress(options.address)) {
      throw new OracleError("INVALID_CONFIG", "Oracle address must not be the zero address");
    }
    assertConfig(options.maxStalenessSeconds, options.maxMoveBps);

    this.address = options.address;
    this._clock = options.clock;
    this._config = {
      maxStalenessSeconds: options.maxStalenessSeconds,
      maxMoveBps: options.maxMoveBps,
    };
    this._access = new AccessControl([
      [ROLES.DEFAULT_ADMIN, options.admin],
      [ROLES.REPORTER, options.reporter],
      [ROLES.GUARDIAN, options.guardian],
    ]);
    this._recorder = new EventRecorder<NavEventPayloads>({
      store: options.store,
      streamId: `oracle:${options.address}`,
      source: "oracle",
      clock: options.clock,
      catalog: options.catalog,
    });
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  getPrice(): NavSnapshot {
    return this._snapshot;
  }

  isValid(): boolean {
    return !this._pause.paused;
  }

  maxOracleStaleness(): number {
    return this._config.maxStalenessSeconds;
  }

  config(): OracleConfig {
    return this._config;
  }

  get paused(): boolean {
    return this._pause.paused;
  }

  get streamId(): string {
    return this._recorder.streamId;
  }

  hasRole(role: Role, account: Address): boolean {
    return this._access.hasRole(role, account);
  }

  // ─── Reporting ───────────────────────────────────────────────────────

  /**
   * Publish a new NAV snapshot.
   *
   * @throws AuthorityError UNAUTHORIZED / ENFORCED_PAUSE
   * @throws OracleError ZERO_VALUE / STALE_TIMESTAMP / TOO_LARGE_MOVE
   */
  reportNav(caller: Address, price: bigint, timestamp: number): NavSnapshot {
    return this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.REPORTER, caller);
      this._pause.assertNotPaused();

      if (price <= 0n || !Number.isSafeInteger(timestamp) || timestamp <= 0) {
        throw new OracleError("ZERO_VALUE", "Price and timestamp must be positive");
      }

      const { maxStalenessSeconds, maxMoveBps } = this._config;
      const oldest = this._clock.now() - maxStalenessSeconds;
      if (timestamp < oldest) {
        throw new OracleError(
          "STALE_TIMESTAMP",
          `Report timestamp ${timestamp} is older than the staleness window (oldest accepted: ${oldest})`,
        );
      }

      const previous = this._snapshot.price;
      if (exceedsMove(previous, price, maxMoveBps)) {
        throw new OracleError(
          "TOO_LARGE_MOVE",
          `Move from ${previous.toString()} to ${price.toString()} exceeds ${maxMoveBps} bps`,
        );
      }

      this._snapshot = { price, updatedAt: timestamp };
      events.emit("oracle.nav.reported", {
        price: price.toString(),
        timestamp,
        previousPrice: previous.toString(),
      });
      return this._snapshot;
    });
  }

  // ─── Administration ──────────────────────────────────────────────────

  setConfig(caller: Address, maxStalenessSeconds: number, maxMoveBps: number): OracleConfig {
    return this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.DEFAULT_ADMIN, caller);
      assertConfig(maxStalenessSeconds, maxMoveBps);

      this._config = { maxStalenessSeconds, maxMoveBps };
      events.emit("oracle.config.updated", { maxStalenessSeconds, maxMoveBps });
      return this._config;
    });
  }

  pause(caller: Address): void {
    this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.GUARDIAN, caller);
      this._pause.pause();
      events.emit("oracle.paused", { account: caller });
    });
  }

  unpause(caller: Address): void {
    this._mutate(caller, (events) => {
      this._access.assertRole(ROLES.GUARDIAN, caller);
      this._pause.unpause();
      events.emit("oracle.unpaused", { account: caller });
    });
  }

  grantRole(caller: Address, role: Role, account: Address): boolean {
    return this._mutate(caller, (events) => {
      const changed = this._access.grantRole(caller, role, account);
      if (changed) {
        events.emit("oracle.role.granted", { role, account, sender: caller });
      }
      return changed;
    });
  }

  revokeRole(caller: Address, role: Role, account: Address): boolean {
    return this._mutate(caller, (events) => {
      const changed = this._access.revokeRole(caller, role, account);
      if (changed) {
        events.emit("oracle.role.revoked", { role, account, sender: caller });
      }
      return changed;
    });
  }

  renounceRole(caller: Address, role: Role): boolean {
    return this._mutate(caller, (events) => {
      const changed = this._access.renounceRole(caller, role);
      if (changed) {
        events.emit("oracle.role.revoked", { role, account: caller, sender: caller });
      }
      return changed;
    });
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _mutate<T>(caller: Address, body: (events: Events) => T): T {
    return this._guard.run(() => this._recorder.record(caller, body));
  }
}

/**
 * |next - previous| * 10000 > previous * maxMoveBps, skipped for the first
 * report and when the guard is disabled.
 */
export function exceedsMove(previous: bigint, next: bigint, maxMoveBps: number): boolean {
  if (maxMoveBps === 0 || previous === 0n) {
    return false;
  }
  const diff = next > previous ? next - previous : previous - next;
  return diff * BPS_DENOMINATOR > previous * BigInt(maxMoveBps);
}

function assertConfig(maxStalenessSeconds: number, maxMoveBps: number): void {
  if (!Number.isSafeInteger(maxStalenessSeconds) || maxStalenessSeconds <= 0) {
    throw new OracleError("INVALID_CONFIG", `maxStalenessSeconds must be a positive integer, got ${maxStalenessSeconds}`);
  }
  if (!Number.isSafeInteger(maxMoveBps) || maxMoveBps < 0) {
    throw new OracleError("INVALID_CONFIG", `maxMoveBps must be a non-negative integer, got ${maxMoveBps}`);
  }
}
