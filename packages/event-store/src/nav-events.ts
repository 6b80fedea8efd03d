/**
 * @navledger/event-store — NAV ledger domain event definitions.
 *
 * Naming convention: `<source>.<entity>.<action>`
 * Examples:
 * - oracle.nav.reported
 * - vault.withdrawal.queued
 * - vault.config.exit_fee
 *
 * Each event type defines a zod payload schema. Payload types are
 * inferred from the schemas so emitters and validators cannot drift.
 * Amounts are decimal strings of base units; timestamps are unix seconds.
 */

import { z } from "zod";
import type { EventSource } from "@navledger/types";
import { EventCatalog } from "./catalog.js";

const uint = z.string().regex(/^(0|[1-9]\d*)$/, "Expected a decimal string of base units");
const address = z.string().min(1);
const seconds = z.number().int().nonnegative();

const roleChange = z.object({ role: z.string().min(1), account: address, sender: address }).strict();
const pauseChange = z.object({ account: address }).strict();

interface NavEventDefinition {
  readonly source: EventSource;
  readonly description: string;
  readonly payload: z.ZodTypeAny;
}

export const NAV_EVENTS = {
  // ─── Oracle ──────────────────────────────────────────────────────────
  "oracle.nav.reported": {
    source: "oracle",
    description: "Reporter published a new NAV snapshot",
    payload: z.object({ price: uint, timestamp: seconds, previousPrice: uint }).strict(),
  },
  "oracle.config.updated": {
    source: "oracle",
    description: "Admin changed the staleness cap or move-size guard",
    payload: z.object({ maxStalenessSeconds: seconds, maxMoveBps: z.number().int().nonnegative() }).strict(),
  },
  "oracle.paused": { source: "oracle", description: "Guardian invalidated the feed", payload: pauseChange },
  "oracle.unpaused": { source: "oracle", description: "Guardian re-validated the feed", payload: pauseChange },
  "oracle.role.granted": { source: "oracle", description: "Oracle role granted", payload: roleChange },
  "oracle.role.revoked": { source: "oracle", description: "Oracle role revoked or renounced", payload: roleChange },

  // ─── Vault flows ─────────────────────────────────────────────────────
  "vault.deposited": {
    source: "vault",
    description: "Assets pulled in and shares minted (deposit or mint)",
    payload: z.object({ caller: address, receiver: address, assets: uint, shares: uint }).strict(),
  },
  "vault.withdrawn": {
    source: "vault",
    description: "Shares burned and net assets paid out (withdraw or redeem)",
    payload: z
      .object({ caller: address, receiver: address, owner: address, assets: uint, shares: uint, fee: uint })
      .strict(),
  },
  "vault.referrer.set": {
    source: "vault",
    description: "A receiver bound its referrer (write-once)",
    payload: z.object({ user: address, referrer: address }).strict(),
  },
  "vault.referral.deposit": {
    source: "vault",
    description: "Deposit attributed to the receiver's bound referrer",
    payload: z.object({ payer: address, receiver: address, referrer: address, assets: uint, shares: uint }).strict(),
  },
  "vault.referral.mint": {
    source: "vault",
    description: "Mint attributed to the receiver's bound referrer",
    payload: z.object({ payer: address, receiver: address, referrer: address, assets: uint, shares: uint }).strict(),
  },
  "vault.flow.updated": {
    source: "vault",
    description: "Cumulative gross deposit/withdrawal counters changed",
    payload: z.object({ totalDeposited: uint, totalWithdrawn: uint }).strict(),
  },

  // ─── Fees & liquidity ────────────────────────────────────────────────
  "vault.fee.accrued": {
    source: "vault",
    description: "Exit fee retained on a payout",
    payload: z.object({ amount: uint, accruedFees: uint }).strict(),
  },
  "vault.fee.swept": {
    source: "vault",
    description: "Accrued exit fees paid out by the admin",
    payload: z.object({ to: address, amount: uint }).strict(),
  },
  "vault.liquidity.moved": {
    source: "vault",
    description: "Operator moved idle assets to the liquidity recipient",
    payload: z.object({ to: address, amount: uint }).strict(),
  },
  "vault.liquidity.funded": {
    source: "vault",
    description: "Assets added to the vault without minting shares",
    payload: z.object({ from: address, amount: uint }).strict(),
  },

  // ─── Withdrawal queue ────────────────────────────────────────────────
  "vault.withdrawal.queued": {
    source: "vault",
    description: "Shares escrowed for an epoch-batched withdrawal",
    payload: z
      .object({ id: z.number().int().positive(), owner: address, receiver: address, shares: uint, claimableAt: seconds })
      .strict(),
  },
  "vault.withdrawal.claimed": {
    source: "vault",
    description: "Escrowed shares burned and paid out at the claim-time price",
    payload: z
      .object({ id: z.number().int().positive(), owner: address, receiver: address, shares: uint, assets: uint, fee: uint })
      .strict(),
  },
  "vault.withdrawal.cancelled": {
    source: "vault",
    description: "Escrowed shares returned to the owner unburned",
    payload: z.object({ id: z.number().int().positive(), owner: address, shares: uint }).strict(),
  },

  // ─── Oracle timelock ─────────────────────────────────────────────────
  "vault.oracle.queued": {
    source: "vault",
    description: "Admin queued a price-source replacement",
    payload: z.object({ newOracle: address, queuedAt: seconds, readyAt: seconds }).strict(),
  },
  "vault.oracle.cancelled": {
    source: "vault",
    description: "Admin discarded the queued price-source replacement",
    payload: z.object({ newOracle: address }).strict(),
  },
  "vault.oracle.changed": {
    source: "vault",
    description: "Price source replaced after the timelock elapsed",
    payload: z.object({ previousOracle: address, newOracle: address }).strict(),
  },

  // ─── Configuration ───────────────────────────────────────────────────
  "vault.config.staleness": {
    source: "vault",
    description: "Vault staleness window changed",
    payload: z.object({ maxAllowedStaleness: seconds }).strict(),
  },
  "vault.config.epoch": {
    source: "vault",
    description: "Withdrawal epoch length changed",
    payload: z.object({ epochSeconds: seconds }).strict(),
  },
  "vault.config.exit_fee": {
    source: "vault",
    description: "Exit fee rate changed",
    payload: z.object({ exitFeeBps: z.number().int().nonnegative() }).strict(),
  },
  "vault.config.liquidity_recipient": {
    source: "vault",
    description: "Liquidity recipient changed",
    payload: z.object({ liquidityRecipient: address }).strict(),
  },
  "vault.paused": { source: "vault", description: "Guardian paused the vault", payload: pauseChange },
  "vault.unpaused": { source: "vault", description: "Guardian unpaused the vault", payload: pauseChange },
  "vault.token.rescued": {
    source: "vault",
    description: "Admin recovered a foreign token held by the vault",
    payload: z.object({ token: address, to: address, amount: uint }).strict(),
  },

  // ─── Shares & roles ──────────────────────────────────────────────────
  "vault.shares.transferred": {
    source: "vault",
    description: "Shares moved between holders",
    payload: z.object({ from: address, to: address, amount: uint }).strict(),
  },
  "vault.shares.approved": {
    source: "vault",
    description: "Share allowance set",
    payload: z.object({ owner: address, spender: address, amount: uint }).strict(),
  },
  "vault.role.granted": { source: "vault", description: "Vault role granted", payload: roleChange },
  "vault.role.revoked": { source: "vault", description: "Vault role revoked or renounced", payload: roleChange },
} as const satisfies Record<string, NavEventDefinition>;

export type NavEventType = keyof typeof NAV_EVENTS;

/** Payload shape of every NAV event, keyed by type. */
export type NavEventPayloads = {
  readonly [K in NavEventType]: z.infer<(typeof NAV_EVENTS)[K]["payload"]>;
};

export type OracleEventType = {
  [K in NavEventType]: (typeof NAV_EVENTS)[K]["source"] extends "oracle" ? K : never;
}[NavEventType];

export type VaultEventType = Exclude<NavEventType, OracleEventType>;

export function isNavEventType(type: string): type is NavEventType {
  return Object.hasOwn(NAV_EVENTS, type);
}

/** Every NAV event type, in definition order. */
export const NAV_EVENT_TYPES: readonly NavEventType[] = Object.keys(NAV_EVENTS).filter(isNavEventType);

/**
 * A catalog with every NAV event registered at schema version 1.
 */
export function createNavCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const [type, definition] of Object.entries(NAV_EVENTS)) {
    catalog.register({
      type,
      version: 1,
      description: definition.description,
      source: definition.source,
      validate: (payload) => definition.payload.safeParse(payload).success,
    });
  }
  return catalog;
}
