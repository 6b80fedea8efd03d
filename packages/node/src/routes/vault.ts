/**
 * Vault routes.
 *
 * Reads:
 * GET  /api/v1/vault                          — Summary: supply, liquidity, fees, config
 * GET  /api/v1/vault/preview?op=&amount=      — Preview or convert at the current NAV
 * GET  /api/v1/vault/accounts/:address        — Share balance, limits, referrer
 * GET  /api/v1/vault/accounts/:address/withdrawals — The account's queued requests
 *
 * Entry and instant exit:
 * POST /api/v1/vault/deposit | mint | withdraw | redeem
 *
 * Shares:
 * POST /api/v1/vault/shares/transfer | approve | transfer-from
 *
 * Withdrawal queue:
 * POST /api/v1/vault/withdrawals               — Escrow shares until the next epoch
 * GET  /api/v1/vault/withdrawals/:id
 * POST /api/v1/vault/withdrawals/:id/claim
 * POST /api/v1/vault/withdrawals/:id/cancel
 *
 * Administration:
 * PUT  /api/v1/vault/config/max-staleness | epoch | exit-fee | liquidity-recipient
 * POST /api/v1/vault/pause | unpause
 * POST /api/v1/vault/liquidity/move | fund
 * POST /api/v1/vault/fees/sweep
 * GET  /api/v1/vault/oracle/pending
 * POST /api/v1/vault/oracle/queue | cancel | execute
 * POST /api/v1/vault/roles/grant | revoke | renounce
 */

import { Hono } from "hono";
import { ZERO_ADDRESS } from "@navledger/types";
import { MAX_UINT256 } from "@navledger/vault";
import type { NavVault } from "@navledger/vault";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  AmountSchema,
  ApproveSchema,
  DepositSchema,
  ExitFeeSchema,
  MintSchema,
  PreviewQuerySchema,
  QueueOracleSchema,
  QueueWithdrawalSchema,
  RecipientSchema,
  RedeemSchema,
  RenounceRoleSchema,
  RequestIdParamSchema,
  RoleChangeSchema,
  SecondsBodySchema,
  SweepFeesSchema,
  TransferFromSchema,
  TransferSchema,
  WithdrawSchema,
} from "../types/dto.js";
import type { PreviewQuery } from "../types/dto.js";
import { toRequestView, toSummaryView } from "../types/views.js";
import { readBody, readParam, readQuery } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";
import { ApiError } from "../types/error.js";

function preview(vault: NavVault, query: PreviewQuery): bigint {
  switch (query.op) {
    case "deposit":
      return vault.previewDeposit(query.amount);
    case "mint":
      return vault.previewMint(query.amount);
    case "withdraw":
      return vault.previewWithdraw(query.amount);
    case "redeem":
      return vault.previewRedeem(query.amount);
    case "toShares":
      return vault.convertToShares(query.amount);
    case "toAssets":
      return vault.convertToAssets(query.amount);
  }
}

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Reads ─────────────────────────────────────────────────────────

  routes.get("/", (c) => {
    const vault = c.get("service").vault;
    return c.json({ data: toSummaryView(vault.summary()) });
  });

  routes.get("/preview", (c) => {
    const vault = c.get("service").vault;
    const query = readQuery(c, PreviewQuerySchema);
    return c.json({
      data: {
        op: query.op,
        amount: query.amount.toString(),
        result: preview(vault, query).toString(),
        pricePerShare: vault.pricePerShare().toString(),
      },
    });
  });

  routes.get("/accounts/:address", (c) => {
    const vault = c.get("service").vault;
    const address = readParam(c, "address", AddressSchema);
    return c.json({
      data: {
        address,
        shares: vault.balanceOf(address).toString(),
        maxWithdraw: vault.maxWithdraw(address).toString(),
        maxRedeem: vault.maxRedeem(address).toString(),
        referrer: vault.referrerOf(address),
      },
    });
  });

  routes.get("/accounts/:address/withdrawals", (c) => {
    const vault = c.get("service").vault;
    const address = readParam(c, "address", AddressSchema);
    const requests = vault
      .allRequestsOf(address)
      .flatMap((id) => {
        const request = vault.withdrawalRequest(id);
        return request === undefined ? [] : [toRequestView(request)];
      });
    return c.json({ data: requests });
  });

  // ─── Entry and instant exit ────────────────────────────────────────

  routes.post("/deposit", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, DepositSchema);
    const receiver = body.receiver ?? caller;

    const shares =
      body.referrer === undefined && body.minShares === undefined
        ? vault.deposit(caller, body.assets, receiver)
        : vault.depositWithCheck(caller, body.assets, receiver, body.referrer ?? ZERO_ADDRESS, body.minShares ?? 0n);
    return c.json({ data: { assets: body.assets.toString(), shares: shares.toString(), receiver } }, 201);
  });

  routes.post("/mint", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, MintSchema);
    const receiver = body.receiver ?? caller;

    const assets =
      body.referrer === undefined && body.maxAssets === undefined
        ? vault.mint(caller, body.shares, receiver)
        : vault.mintWithCheck(
            caller,
            body.shares,
            receiver,
            body.referrer ?? ZERO_ADDRESS,
            body.maxAssets ?? MAX_UINT256,
          );
    return c.json({ data: { assets: assets.toString(), shares: body.shares.toString(), receiver } }, 201);
  });

  routes.post("/withdraw", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, WithdrawSchema);
    const receiver = body.receiver ?? caller;
    const owner = body.owner ?? caller;

    const shares =
      body.maxShares === undefined
        ? vault.withdraw(caller, body.assets, receiver, owner)
        : vault.withdrawWithCheck(caller, body.assets, receiver, owner, body.maxShares);
    return c.json({ data: { assets: body.assets.toString(), shares: shares.toString(), receiver, owner } });
  });

  routes.post("/redeem", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, RedeemSchema);
    const receiver = body.receiver ?? caller;
    const owner = body.owner ?? caller;

    const assets =
      body.minAssets === undefined
        ? vault.redeem(caller, body.shares, receiver, owner)
        : vault.redeemWithCheck(caller, body.shares, receiver, owner, body.minAssets);
    return c.json({ data: { assets: assets.toString(), shares: body.shares.toString(), receiver, owner } });
  });

  // ─── Shares ────────────────────────────────────────────────────────

  routes.post("/shares/transfer", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, TransferSchema);
    vault.transfer(caller, body.to, body.amount);
    return c.json({ data: { from: caller, to: body.to, amount: body.amount.toString() } });
  });

  routes.post("/shares/approve", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, ApproveSchema);
    vault.approve(caller, body.spender, body.amount);
    return c.json({ data: { owner: caller, spender: body.spender, amount: body.amount.toString() } });
  });

  routes.post("/shares/transfer-from", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, TransferFromSchema);
    vault.transferFrom(caller, body.from, body.to, body.amount);
    return c.json({ data: { from: body.from, to: body.to, amount: body.amount.toString() } });
  });

  // ─── Withdrawal queue ──────────────────────────────────────────────

  routes.post("/withdrawals", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, QueueWithdrawalSchema);
    const id = vault.queueWithdrawal(caller, body.shares, body.receiver ?? caller);
    return c.json({ data: toRequestView(requestOrThrow(vault, id)) }, 201);
  });

  routes.get("/withdrawals/:id", (c) => {
    const vault = c.get("service").vault;
    const id = readParam(c, "id", RequestIdParamSchema);
    return c.json({ data: toRequestView(requestOrThrow(vault, id)) });
  });

  routes.post("/withdrawals/:id/claim", (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const id = readParam(c, "id", RequestIdParamSchema);
    const assets = vault.claimWithdrawal(caller, id);
    return c.json({ data: { ...toRequestView(requestOrThrow(vault, id)), assets: assets.toString() } });
  });

  routes.post("/withdrawals/:id/cancel", (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const id = readParam(c, "id", RequestIdParamSchema);
    vault.cancelWithdrawal(caller, id);
    return c.json({ data: toRequestView(requestOrThrow(vault, id)) });
  });

  // ─── Configuration ─────────────────────────────────────────────────

  routes.put("/config/max-staleness", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, SecondsBodySchema);
    vault.setMaxAllowedStaleness(caller, body.seconds);
    return c.json({ data: vault.config() });
  });

  routes.put("/config/epoch", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, SecondsBodySchema);
    vault.setEpochSeconds(caller, body.seconds);
    return c.json({ data: vault.config() });
  });

  routes.put("/config/exit-fee", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, ExitFeeSchema);
    vault.setExitFeeBps(caller, body.bps);
    return c.json({ data: vault.config() });
  });

  routes.put("/config/liquidity-recipient", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, RecipientSchema);
    vault.setLiquidityRecipient(caller, body.address);
    return c.json({ data: vault.config() });
  });

  routes.post("/pause", (c) => {
    const vault = c.get("service").vault;
    vault.pause(requireCaller(c));
    return c.json({ data: { paused: vault.paused } });
  });

  routes.post("/unpause", (c) => {
    const vault = c.get("service").vault;
    vault.unpause(requireCaller(c));
    return c.json({ data: { paused: vault.paused } });
  });

  // ─── Liquidity and fees ────────────────────────────────────────────

  routes.post("/liquidity/move", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, AmountSchema);
    vault.moveAssets(caller, body.amount);
    return c.json({ data: { idleLiquidity: vault.idleLiquidity().toString() } });
  });

  routes.post("/liquidity/fund", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, AmountSchema);
    vault.fundLiquidity(caller, body.amount);
    return c.json({ data: { idleLiquidity: vault.idleLiquidity().toString() } });
  });

  routes.post("/fees/sweep", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, SweepFeesSchema);
    const amount = vault.sweepExitFees(caller, body.to);
    return c.json({ data: { to: body.to, amount: amount.toString(), accruedFees: vault.accruedFees().toString() } });
  });

  // ─── Oracle replacement ────────────────────────────────────────────

  routes.get("/oracle/pending", (c) => {
    return c.json({ data: c.get("service").vault.pendingOracleUpdate() });
  });

  routes.post("/oracle/queue", async (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const body = await readBody(c, QueueOracleSchema);
    const candidate = service.oracle(body.oracle);
    return c.json({ data: service.vault.queueOracleUpdate(caller, candidate) }, 202);
  });

  routes.post("/oracle/cancel", (c) => {
    const vault = c.get("service").vault;
    vault.cancelOracleUpdate(requireCaller(c));
    return c.json({ data: { pending: vault.pendingOracleUpdate() } });
  });

  routes.post("/oracle/execute", (c) => {
    const vault = c.get("service").vault;
    const oracle = vault.executeOracleUpdate(requireCaller(c));
    return c.json({ data: { oracle } });
  });

  // ─── Roles ─────────────────────────────────────────────────────────

  routes.post("/roles/grant", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, RoleChangeSchema);
    return c.json({ data: { changed: vault.grantRole(caller, body.role, body.account) } });
  });

  routes.post("/roles/revoke", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, RoleChangeSchema);
    return c.json({ data: { changed: vault.revokeRole(caller, body.role, body.account) } });
  });

  routes.post("/roles/renounce", async (c) => {
    const vault = c.get("service").vault;
    const caller = requireCaller(c);
    const body = await readBody(c, RenounceRoleSchema);
    return c.json({ data: { changed: vault.renounceRole(caller, body.role) } });
  });

  return routes;
}

function requestOrThrow(vault: NavVault, id: number) {
  const request = vault.withdrawalRequest(id);
  if (request === undefined) {
    throw new ApiError("NOT_FOUND", `Withdrawal request ${id} not found`);
  }
  return request;
}
