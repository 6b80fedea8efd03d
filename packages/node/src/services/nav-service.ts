/**
 * NavService — Composition root for the ledger packages.
 *
 * Route handlers delegate to this service; they never construct domain
 * objects themselves. One service owns one event store, one asset ledger,
 * one vault and every oracle deployed for it (the live one plus any
 * candidates for a timelocked swap).
 */

import type { Logger } from "pino";
import type { Address, Clock } from "@navledger/types";
import { TokenLedger } from "@navledger/ledger";
import { AuthorityError, ROLES } from "@navledger/authority";
import { InMemoryEventStore, createNavCatalog } from "@navledger/event-store";
import type {
  EventCatalog,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "@navledger/event-store";
import { NavOracle } from "@navledger/oracle";
import { NavVault } from "@navledger/vault";
import { ApiError } from "../types/error.js";

// =============================================================================
// Configuration
// =============================================================================

export interface NavServiceConfig {
  readonly clock: Clock;
  readonly admin: Address;
  readonly operator: Address;
  readonly guardian: Address;
  readonly reporter: Address;
  readonly asset: {
    readonly address: Address;
    readonly name: string;
    readonly symbol: string;
    readonly decimals: number;
  };
  readonly oracle: {
    readonly address: Address;
    readonly maxStalenessSeconds: number;
    readonly maxMoveBps: number;
  };
  readonly vault: {
    readonly address: Address;
    readonly name: string;
    readonly symbol: string;
    readonly maxAllowedStaleness: number;
    readonly epochSeconds: number;
    readonly exitFeeBps: number;
    readonly liquidityRecipient?: Address | undefined;
  };
  readonly faucetEnabled: boolean;
  /** Appended events are logged here at debug level */
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class NavService {
  readonly clock: Clock;
  readonly eventStore: InMemoryEventStore;
  readonly catalog: EventCatalog;
  readonly asset: TokenLedger;
  readonly vault: NavVault;

  private readonly _config: NavServiceConfig;
  private readonly _oracles = new Map<Address, NavOracle>();
  private readonly _eventLog: Subscription | undefined;

  constructor(config: NavServiceConfig) {
    this._config = config;
    this.clock = config.clock;
    this.eventStore = new InMemoryEventStore({ clock: config.clock });
    this.catalog = createNavCatalog();

    const logger = config.logger;
    this._eventLog =
      logger === undefined
        ? undefined
        : this.eventStore.subscribeAll((stored) => {
            logger.debug(
              { type: stored.event.type, streamId: stored.streamId, position: stored.globalPosition },
              "event appended",
            );
          });

    this.asset = new TokenLedger(config.asset);
    const oracle = this._createOracle(
      config.oracle.address,
      config.oracle.maxStalenessSeconds,
      config.oracle.maxMoveBps,
    );

    this.vault = new NavVault({
      ...config.vault,
      asset: this.asset,
      oracle,
      admin: config.admin,
      operator: config.operator,
      guardian: config.guardian,
      clock: config.clock,
      store: this.eventStore,
      catalog: this.catalog,
    });
  }

  // ─── Oracles ───────────────────────────────────────────────────────

  /** The oracle the vault currently prices against. */
  currentOracle(): NavOracle {
    return this.oracle(this.vault.oracle.address);
  }

  /**
   * @throws ApiError ORACLE_NOT_FOUND
   */
  oracle(address: Address): NavOracle {
    const oracle = this._oracles.get(address);
    if (oracle === undefined) {
      throw new ApiError("ORACLE_NOT_FOUND", `No oracle deployed at ${address}`);
    }
    return oracle;
  }

  listOracles(): readonly NavOracle[] {
    return [...this._oracles.values()];
  }

  /**
   * Deploy a candidate oracle with the configured role holders.
   * Only a vault admin may deploy; the vault still has to queue and
   * execute the swap through its timelock.
   */
  deployOracle(
    caller: Address,
    address: Address,
    maxStalenessSeconds: number = this._config.oracle.maxStalenessSeconds,
    maxMoveBps: number = this._config.oracle.maxMoveBps,
  ): NavOracle {
    if (!this.vault.hasRole(ROLES.DEFAULT_ADMIN, caller)) {
      throw new AuthorityError("UNAUTHORIZED", `Account ${caller} is missing role ${ROLES.DEFAULT_ADMIN}`);
    }
    if (this._oracles.has(address)) {
      throw new ApiError("ORACLE_EXISTS", `An oracle is already deployed at ${address}`);
    }
    return this._createOracle(address, maxStalenessSeconds, maxMoveBps);
  }

  // ─── Asset ─────────────────────────────────────────────────────────

  /**
   * Mint test units of the asset.
   *
   * @throws ApiError FAUCET_DISABLED unless enabled in configuration
   */
  faucet(to: Address, amount: bigint): void {
    if (!this._config.faucetEnabled) {
      throw new ApiError("FAUCET_DISABLED", "The asset faucet is disabled");
    }
    this.asset.mint(to, amount);
  }

  get faucetEnabled(): boolean {
    return this._config.faucetEnabled;
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  verifyEventLog(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  /** Detach the event logger. */
  stop(): void {
    this._eventLog?.unsubscribe();
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _createOracle(address: Address, maxStalenessSeconds: number, maxMoveBps: number): NavOracle {
    const oracle = new NavOracle({
      address,
      admin: this._config.admin,
      reporter: this._config.reporter,
      guardian: this._config.guardian,
      maxStalenessSeconds,
      maxMoveBps,
      clock: this.clock,
      store: this.eventStore,
      catalog: this.catalog,
    });
    this._oracles.set(address, oracle);
    return oracle;
  }
}
