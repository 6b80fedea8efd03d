/**
 * Underlying asset routes.
 *
 * GET  /api/v1/asset                     — Token metadata and total supply
 * GET  /api/v1/asset/balances/:address   — Balance and allowance to the vault
 * POST /api/v1/asset/approve             — Approve a spender (defaults to the vault)
 * POST /api/v1/asset/transfer            — Transfer from the caller
 * POST /api/v1/asset/faucet              — Mint test units, when enabled
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, AssetApproveSchema, FaucetSchema, TransferSchema } from "../types/dto.js";
import { readBody, readParam } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

export function createAssetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    const asset = service.asset;
    return c.json({
      data: {
        address: asset.address,
        name: asset.name,
        symbol: asset.symbol,
        decimals: asset.decimals,
        totalSupply: asset.totalSupply().toString(),
        faucetEnabled: service.faucetEnabled,
      },
    });
  });

  routes.get("/balances/:address", (c) => {
    const service = c.get("service");
    const address = readParam(c, "address", AddressSchema);
    return c.json({
      data: {
        address,
        balance: service.asset.balanceOf(address).toString(),
        vaultAllowance: service.asset.allowance(address, service.vault.address).toString(),
      },
    });
  });

  routes.post("/approve", async (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const body = await readBody(c, AssetApproveSchema);
    const spender = body.spender ?? service.vault.address;

    service.asset.approve(caller, spender, body.amount);
    return c.json({ data: { owner: caller, spender, amount: body.amount.toString() } });
  });

  routes.post("/transfer", async (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const body = await readBody(c, TransferSchema);

    service.asset.transfer(caller, body.to, body.amount);
    return c.json({ data: { from: caller, to: body.to, amount: body.amount.toString() } });
  });

  routes.post("/faucet", async (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const body = await readBody(c, FaucetSchema);
    const to = body.to ?? caller;

    service.faucet(to, body.amount);
    return c.json({ data: { to, amount: body.amount.toString(), balance: service.asset.balanceOf(to).toString() } }, 201);
  });

  return routes;
}
