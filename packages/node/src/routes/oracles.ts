/**
 * Oracle routes.
 *
 * GET  /api/v1/oracles                        — Deployed oracles, marking the vault's current one
 * POST /api/v1/oracles                        — Deploy a candidate oracle (vault admin)
 * GET  /api/v1/oracles/:address               — One oracle
 * POST /api/v1/oracles/:address/report        — Publish a NAV (reporter)
 * PUT  /api/v1/oracles/:address/config        — Staleness cap and move guard (admin)
 * POST /api/v1/oracles/:address/pause         — Invalidate the feed (guardian)
 * POST /api/v1/oracles/:address/unpause       — Re-validate the feed (guardian)
 * POST /api/v1/oracles/:address/roles/grant   — Grant a role (admin)
 * POST /api/v1/oracles/:address/roles/revoke  — Revoke a role (admin)
 * POST /api/v1/oracles/:address/roles/renounce — Drop one of the caller's roles
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DeployOracleSchema,
  OracleConfigSchema,
  RenounceRoleSchema,
  ReportNavSchema,
  RoleChangeSchema,
} from "../types/dto.js";
import { toOracleView } from "../types/views.js";
import { readBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

export function createOracleRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    const current = service.vault.oracle.address;
    return c.json({
      data: service.listOracles().map((oracle) => toOracleView(oracle, oracle.address === current)),
    });
  });

  routes.post("/", async (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const body = await readBody(c, DeployOracleSchema);

    const oracle = service.deployOracle(caller, body.address, body.maxStalenessSeconds, body.maxMoveBps);
    return c.json({ data: toOracleView(oracle, false) }, 201);
  });

  routes.get("/:address", (c) => {
    const service = c.get("service");
    const oracle = service.oracle(c.req.param("address"));
    return c.json({ data: toOracleView(oracle, oracle.address === service.vault.oracle.address) });
  });

  routes.post("/:address/report", async (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const oracle = service.oracle(c.req.param("address"));
    const body = await readBody(c, ReportNavSchema);

    const snapshot = oracle.reportNav(caller, body.price, body.timestamp);
    return c.json({ data: { price: snapshot.price.toString(), updatedAt: snapshot.updatedAt } });
  });

  routes.put("/:address/config", async (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const oracle = service.oracle(c.req.param("address"));
    const body = await readBody(c, OracleConfigSchema);

    return c.json({ data: oracle.setConfig(caller, body.maxStalenessSeconds, body.maxMoveBps) });
  });

  routes.post("/:address/pause", (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const oracle = service.oracle(c.req.param("address"));
    oracle.pause(caller);
    return c.json({ data: { paused: oracle.paused } });
  });

  routes.post("/:address/unpause", (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const oracle = service.oracle(c.req.param("address"));
    oracle.unpause(caller);
    return c.json({ data: { paused: oracle.paused } });
  });

  routes.post("/:address/roles/grant", async (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const oracle = service.oracle(c.req.param("address"));
    const body = await readBody(c, RoleChangeSchema);
    return c.json({ data: { changed: oracle.grantRole(caller, body.role, body.account) } });
  });

  routes.post("/:address/roles/revoke", async (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const oracle = service.oracle(c.req.param("address"));
    const body = await readBody(c, RoleChangeSchema);
    return c.json({ data: { changed: oracle.revokeRole(caller, body.role, body.account) } });
  });

  routes.post("/:address/roles/renounce", async (c) => {
    const service = c.get("service");
    const caller = requireCaller(c);
    const oracle = service.oracle(c.req.param("address"));
    const body = await readBody(c, RenounceRoleSchema);
    return c.json({ data: { changed: oracle.renounceRole(caller, body.role) } });
  });

  return routes;
}
