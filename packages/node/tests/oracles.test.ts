/**
 * Tests for oracle routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ADMIN, ALICE, BOB, GUARDIAN, ONE, ORACLE, REPORTER, START, asCaller, createTestApp, jsonRequest } from "./setup.js";
import type { TestApp } from "./setup.js";

let t: TestApp;

beforeEach(() => {
  t = createTestApp();
});

function report(caller: string, price: bigint, timestamp: number = START) {
  return t.app.request(
    asCaller(caller, `/api/v1/oracles/${ORACLE}/report`, "POST", { price: price.toString(), timestamp }),
  );
}

describe("GET /api/v1/oracles", () => {
  it("lists the vault's oracle before any report", async () => {
    const res = await t.app.request("/api/v1/oracles");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: [
        {
          address: ORACLE,
          price: "0",
          nav: "0.000000000000000000",
          updatedAt: 0,
          valid: true,
          paused: false,
          maxStalenessSeconds: 3600,
          maxMoveBps: 1000,
          current: true,
        },
      ],
    });
  });

  it("returns 404 for an unknown oracle", async () => {
    const res = await t.app.request("/api/v1/oracles/0xnope");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "ORACLE_NOT_FOUND", message: "No oracle deployed at 0xnope" },
    });
  });
});

describe("POST /api/v1/oracles/:address/report", () => {
  it("publishes a NAV from the reporter", async () => {
    const res = await report(REPORTER, ONE);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { price: ONE.toString(), updatedAt: START } });

    const view = await t.app.request(`/api/v1/oracles/${ORACLE}`);
    expect(await view.json()).toMatchObject({
      data: { price: ONE.toString(), nav: "1.000000000000000000", updatedAt: START },
    });
  });

  it("requires authentication", async () => {
    const res = await t.app.request(
      jsonRequest(`/api/v1/oracles/${ORACLE}/report`, "POST", { price: "1", timestamp: START }),
    );

    expect(res.status).toBe(401);
  });

  it("rejects a non-reporter", async () => {
    const res = await report(ALICE, ONE);

    expect(res.status).toBe(403);
    expect(await res.json()).toMatchObject({ error: { code: "UNAUTHORIZED" } });
  });

  it("rejects a move beyond the guard", async () => {
    await report(REPORTER, ONE);
    // 1000 bps allows up to 1.1; 1.2 is too far
    const res = await report(REPORTER, (ONE * 12n) / 10n);

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ error: { code: "TOO_LARGE_MOVE" } });
  });

  it("rejects a timestamp older than the staleness window", async () => {
    const res = await report(REPORTER, ONE, START - 3601);

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ error: { code: "STALE_TIMESTAMP" } });
  });

  it("rejects a zero price", async () => {
    const res = await report(REPORTER, 0n);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "ZERO_VALUE" } });
  });
});

describe("PUT /api/v1/oracles/:address/config", () => {
  it("lets the admin change the guards", async () => {
    const res = await t.app.request(
      asCaller(ADMIN, `/api/v1/oracles/${ORACLE}/config`, "PUT", { maxStalenessSeconds: 7200, maxMoveBps: 50 }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { maxStalenessSeconds: 7200, maxMoveBps: 50 } });
  });

  it("rejects a zero staleness cap", async () => {
    const res = await t.app.request(
      asCaller(ADMIN, `/api/v1/oracles/${ORACLE}/config`, "PUT", { maxStalenessSeconds: 0, maxMoveBps: 50 }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "INVALID_CONFIG" } });
  });
});

describe("pause", () => {
  it("invalidates the feed until unpaused", async () => {
    await report(REPORTER, ONE);

    const paused = await t.app.request(asCaller(GUARDIAN, `/api/v1/oracles/${ORACLE}/pause`));
    expect(await paused.json()).toEqual({ data: { paused: true } });
    expect(t.service.currentOracle().isValid()).toBe(false);

    const blocked = await report(REPORTER, ONE);
    expect(blocked.status).toBe(409);
    expect(await blocked.json()).toMatchObject({ error: { code: "ENFORCED_PAUSE" } });

    const unpaused = await t.app.request(asCaller(GUARDIAN, `/api/v1/oracles/${ORACLE}/unpause`));
    expect(await unpaused.json()).toEqual({ data: { paused: false } });
  });

  it("rejects unpausing a running feed", async () => {
    const res = await t.app.request(asCaller(GUARDIAN, `/api/v1/oracles/${ORACLE}/unpause`));

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ error: { code: "EXPECTED_PAUSE" } });
  });
});

describe("POST /api/v1/oracles", () => {
  it("deploys a candidate oracle for the admin", async () => {
    const res = await t.app.request(asCaller(ADMIN, "/api/v1/oracles", "POST", { address: "0xnext" }));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: {
        address: "0xnext",
        price: "0",
        nav: "0.000000000000000000",
        updatedAt: 0,
        valid: true,
        paused: false,
        maxStalenessSeconds: 3600,
        maxMoveBps: 1000,
        current: false,
      },
    });
    expect(t.service.listOracles().map((o) => o.address)).toEqual([ORACLE, "0xnext"]);
  });

  it("rejects a duplicate address", async () => {
    const res = await t.app.request(asCaller(ADMIN, "/api/v1/oracles", "POST", { address: ORACLE }));

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ error: { code: "ORACLE_EXISTS" } });
  });

  it("rejects a non-admin", async () => {
    const res = await t.app.request(asCaller(ALICE, "/api/v1/oracles", "POST", { address: "0xnext" }));

    expect(res.status).toBe(403);
  });
});

describe("roles", () => {
  it("grants, revokes and renounces the reporter role", async () => {
    const grant = await t.app.request(
      asCaller(ADMIN, `/api/v1/oracles/${ORACLE}/roles/grant`, "POST", { role: "REPORTER_ROLE", account: BOB }),
    );
    expect(await grant.json()).toEqual({ data: { changed: true } });
    expect((await report(BOB, ONE)).status).toBe(200);

    const regrant = await t.app.request(
      asCaller(ADMIN, `/api/v1/oracles/${ORACLE}/roles/grant`, "POST", { role: "REPORTER_ROLE", account: BOB }),
    );
    expect(await regrant.json()).toEqual({ data: { changed: false } });

    const revoke = await t.app.request(
      asCaller(ADMIN, `/api/v1/oracles/${ORACLE}/roles/revoke`, "POST", { role: "REPORTER_ROLE", account: BOB }),
    );
    expect(await revoke.json()).toEqual({ data: { changed: true } });
    expect((await report(BOB, ONE)).status).toBe(403);

    const renounce = await t.app.request(
      asCaller(REPORTER, `/api/v1/oracles/${ORACLE}/roles/renounce`, "POST", { role: "REPORTER_ROLE" }),
    );
    expect(await renounce.json()).toEqual({ data: { changed: true } });
    expect(t.service.currentOracle().hasRole("REPORTER_ROLE", REPORTER)).toBe(false);
  });

  it("rejects an unknown role name", async () => {
    const res = await t.app.request(
      asCaller(ADMIN, `/api/v1/oracles/${ORACLE}/roles/grant`, "POST", { role: "ROOT", account: BOB }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
  });
});
