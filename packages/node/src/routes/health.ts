/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event log hash chain + current oracle)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

interface SubsystemStatus {
  readonly status: "ok" | "degraded" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const service = c.get("service");
    const integrity = service.verifyEventLog();
    const oracle = service.currentOracle();

    const eventLog: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : { status: "down", detail: `errors=${integrity.errors.length}` };

    // A paused or unprimed feed blocks pricing but not the service itself
    const priced = oracle.isValid() && oracle.getPrice().price > 0n;
    const priceFeed: SubsystemStatus = priced
      ? { status: "ok" }
      : { status: "degraded", detail: oracle.paused ? "paused" : "unprimed" };

    const ready = eventLog.status === "ok";
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: { eventLog, priceFeed },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
