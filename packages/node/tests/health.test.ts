/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reports event-log integrity and price-feed state
 * - X-Request-Id is set on responses
 */

import { describe, it, expect, vi } from "vitest";
import { GUARDIAN, ONE, REPORTER, createTestApp, jsonRequest } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", timestamp: expect.any(String) });
  });

  it("includes X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "test-req-123",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces an unsafe incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, {
        "X-Request-Id": "<script>",
      }),
    );

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("GET /ready", () => {
  it("is ready with a degraded feed before the first report", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ready",
      subsystems: {
        eventLog: { status: "ok" },
        priceFeed: { status: "degraded", detail: "unprimed" },
      },
    });
  });

  it("reports the feed ok once a price is published", async () => {
    const t = createTestApp();
    t.service.currentOracle().reportNav(REPORTER, ONE, t.clock.now());

    const res = await t.app.request("/ready");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ready",
      subsystems: { eventLog: { status: "ok" }, priceFeed: { status: "ok" } },
    });
  });

  it("reports a paused feed as degraded", async () => {
    const t = createTestApp();
    t.service.currentOracle().reportNav(REPORTER, ONE, t.clock.now());
    t.service.currentOracle().pause(GUARDIAN);

    const res = await t.app.request("/ready");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      subsystems: { priceFeed: { status: "degraded", detail: "paused" } },
    });
  });

  it("returns 503 when the event log fails verification", async () => {
    const t = createTestApp();
    vi.spyOn(t.service, "verifyEventLog").mockReturnValue({
      valid: false,
      lastVerifiedPosition: 2,
      errors: [{ position: 3, reason: "hash mismatch" }],
    });

    const res = await t.app.request("/ready");
    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({
      status: "not_ready",
      subsystems: { eventLog: { status: "down", detail: "errors=1" } },
    });
  });
});

describe("error handling", () => {
  it("returns 404 for unknown routes", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nonexistent");

    expect(res.status).toBe(404);
  });
});
