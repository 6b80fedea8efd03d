/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { ALICE, asCaller, createTestApp } from "../setup.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({}, { logFn: (entry) => entries.push(entry) });

    await app.request("/health", { headers: { "X-Request-Id": "req-1" } });

    expect(entries).toEqual([
      { method: "GET", path: "/health", status: 200, durationMs: expect.any(Number), requestId: "req-1" },
    ]);
  });

  it("logs the status of a POST", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({}, { logFn: (entry) => entries.push(entry) });

    await app.request(asCaller(ALICE, "/api/v1/asset/faucet", "POST", { amount: "5000000" }));

    expect(entries.map((e) => [e.method, e.path, e.status])).toEqual([["POST", "/api/v1/asset/faucet", 201]]);
  });

  it("logs rejected requests with their error status", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({}, { logFn: (entry) => entries.push(entry) });

    await app.request(asCaller(ALICE, "/api/v1/vault/pause"));

    expect(entries.map((e) => e.status)).toEqual([403]);
  });
});
