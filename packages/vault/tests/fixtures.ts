/**
 * Shared deployment for vault tests: a 6-decimal asset, a primed oracle at
 * 1.0, and a vault wired to one in-memory store with catalog validation.
 */

import type { Address } from "@navledger/types";
import { ManualClock } from "@navledger/types";
import type { FungibleToken } from "@navledger/ledger";
import { TokenLedger } from "@navledger/ledger";
import { InMemoryEventStore, createNavCatalog } from "@navledger/event-store";
import type { EventCatalog } from "@navledger/event-store";
import { NavOracle } from "@navledger/oracle";
import { NavVault } from "../src/nav-vault.js";
import type { VaultOptions } from "../src/types.js";

export const ADMIN = "0xad";
export const OPERATOR = "0x0e";
export const GUARDIAN = "0x6a";
export const REPORTER = "0x4e";
export const ALICE = "0xa11ce";
export const BOB = "0xb0b";
export const REF = "0x4ef";
export const TREASURY = "0x7ea5";

export const START = 1_700_000_000;
/** First 3600-second boundary after START */
export const BOUNDARY = 1_700_002_800;

export const usdc = (whole: bigint): bigint => whole * 1_000_000n;
export const e18 = (whole: bigint): bigint => whole * 10n ** 18n;

export type VaultOverrides = Partial<
  Pick<VaultOptions, "exitFeeBps" | "epochSeconds" | "maxAllowedStaleness" | "liquidityRecipient">
>;

export interface Deployment {
  readonly clock: ManualClock;
  readonly store: InMemoryEventStore;
  readonly catalog: EventCatalog;
  readonly asset: TokenLedger;
  readonly oracle: NavOracle;
  readonly vault: NavVault;
  /** Mint `amount` of the asset to `holder` and approve the vault for it. */
  fund(holder: Address, amount: bigint): void;
  /** Event types on the vault stream, oldest first. */
  vaultEventTypes(): string[];
}

export function deployOracle(
  clock: ManualClock,
  store: InMemoryEventStore,
  catalog: EventCatalog,
  address = "0x0rac1e",
): NavOracle {
  const oracle = new NavOracle({
    address,
    admin: ADMIN,
    reporter: REPORTER,
    guardian: GUARDIAN,
    maxStalenessSeconds: 86_400,
    maxMoveBps: 0,
    clock,
    store,
    catalog,
  });
  oracle.reportNav(REPORTER, e18(1n), clock.now());
  return oracle;
}

export function deploy(overrides: VaultOverrides = {}): Deployment {
  const clock = new ManualClock(START);
  const store = new InMemoryEventStore({ clock });
  const catalog = createNavCatalog();
  const asset = new TokenLedger({ address: "0xusdc", name: "Test Dollar", symbol: "TUSD", decimals: 6 });
  const oracle = deployOracle(clock, store, catalog);

  const vault = new NavVault({
    address: "0xva017",
    name: "NAV Vault Share",
    symbol: "nvTUSD",
    asset,
    oracle,
    admin: ADMIN,
    operator: OPERATOR,
    guardian: GUARDIAN,
    maxAllowedStaleness: 3600,
    epochSeconds: 3600,
    clock,
    store,
    catalog,
    ...overrides,
  });

  return {
    clock,
    store,
    catalog,
    asset,
    oracle,
    vault,
    fund(holder, amount) {
      asset.mint(holder, amount);
      asset.approve(holder, vault.address, asset.allowance(holder, vault.address) + amount);
    },
    vaultEventTypes() {
      return store.read(vault.streamId).map((stored) => stored.event.type);
    },
  };
}

/**
 * A token that runs a callback before every transferFrom, for reentrancy tests.
 */
export class HookedToken implements FungibleToken {
  readonly address = "0xh00k";
  readonly name = "Hooked";
  readonly symbol = "HOOK";
  readonly decimals = 6;

  onTransferFrom: (() => void) | undefined;

  private readonly _inner = new TokenLedger({
    address: this.address,
    name: this.name,
    symbol: this.symbol,
    decimals: this.decimals,
  });

  mint(to: Address, amount: bigint): void {
    this._inner.mint(to, amount);
  }

  totalSupply(): bigint {
    return this._inner.totalSupply();
  }

  balanceOf(account: Address): bigint {
    return this._inner.balanceOf(account);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._inner.allowance(owner, spender);
  }

  transfer(caller: Address, to: Address, amount: bigint): void {
    this._inner.transfer(caller, to, amount);
  }

  approve(caller: Address, spender: Address, amount: bigint): void {
    this._inner.approve(caller, spender, amount);
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): void {
    this.onTransferFrom?.();
    this._inner.transferFrom(caller, from, to, amount);
  }
}
