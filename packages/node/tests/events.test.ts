/**
 * Tests for event query routes.
 *
 * Events are produced by real domain operations: one NAV report on the
 * oracle stream, then a deposit (deposited + flow update) on the vault.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { ALICE, ONE, createTestApp, primeAndFund } from "./setup.js";
import type { TestApp } from "./setup.js";
import { encodeCursor } from "../src/types/pagination.js";

const PageSchema = z.object({
  data: z.array(
    z.object({
      streamId: z.string(),
      version: z.number(),
      globalPosition: z.number(),
      event: z.object({ type: z.string() }),
    }),
  ),
  pagination: z.object({ cursor: z.string().nullable(), hasMore: z.boolean() }),
});

async function readPage(res: Response) {
  return PageSchema.parse(await res.json());
}

let t: TestApp;

beforeEach(() => {
  t = createTestApp();
});

describe("GET /api/v1/events", () => {
  it("returns empty list when no events exist", async () => {
    const res = await t.app.request("/api/v1/events");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: [], pagination: { cursor: null, hasMore: false } });
  });

  it("returns events in global order", async () => {
    primeAndFund(t, ONE, ALICE, 100_000_000n);
    t.service.vault.deposit(ALICE, 100_000_000n, ALICE);

    const page = await readPage(await t.app.request("/api/v1/events"));
    expect(page.data.map((e) => [e.globalPosition, e.event.type])).toEqual([
      [1, "oracle.nav.reported"],
      [2, "vault.deposited"],
      [3, "vault.flow.updated"],
    ]);
  });

  it("pages with limit and cursor", async () => {
    primeAndFund(t, ONE, ALICE, 100_000_000n);
    t.service.vault.deposit(ALICE, 100_000_000n, ALICE);

    const first = await readPage(await t.app.request("/api/v1/events?limit=2"));
    expect(first.data).toHaveLength(2);
    expect(first.pagination).toEqual({ cursor: encodeCursor("globalPosition", 2), hasMore: true });

    const second = await readPage(
      await t.app.request(`/api/v1/events?limit=2&cursor=${first.pagination.cursor ?? ""}`),
    );
    expect(second.data.map((e) => e.event.type)).toEqual(["vault.flow.updated"]);
    expect(second.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("filters by type", async () => {
    primeAndFund(t, ONE, ALICE, 100_000_000n);
    t.service.vault.deposit(ALICE, 100_000_000n, ALICE);

    const page = await readPage(await t.app.request("/api/v1/events?type=vault.deposited"));
    expect(page.data.map((e) => e.globalPosition)).toEqual([2]);
  });

  it("starts after a given position", async () => {
    primeAndFund(t, ONE, ALICE, 100_000_000n);
    t.service.vault.deposit(ALICE, 100_000_000n, ALICE);

    const page = await readPage(await t.app.request("/api/v1/events?afterPosition=1"));
    expect(page.data.map((e) => e.globalPosition)).toEqual([2, 3]);
  });

  it("rejects a limit above 100", async () => {
    const res = await t.app.request("/api/v1/events?limit=101");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
  });
});

describe("GET /api/v1/events/catalog", () => {
  it("lists registered event types", async () => {
    const res = await t.app.request("/api/v1/events/catalog");
    expect(res.status).toBe(200);

    expect(await res.json()).toEqual({
      data: expect.arrayContaining([
        {
          type: "oracle.nav.reported",
          version: 1,
          source: "oracle",
          description: "Reporter published a new NAV snapshot",
        },
      ]),
    });
  });
});

describe("GET /api/v1/events/:streamId", () => {
  it("returns events for a specific stream", async () => {
    primeAndFund(t, ONE, ALICE, 100_000_000n);
    t.service.vault.deposit(ALICE, 100_000_000n, ALICE);

    const page = await readPage(
      await t.app.request(`/api/v1/events/${encodeURIComponent(t.service.vault.streamId)}`),
    );
    expect(page.data.map((e) => [e.version, e.event.type])).toEqual([
      [1, "vault.deposited"],
      [2, "vault.flow.updated"],
    ]);
    expect(page.data.every((e) => e.streamId === "vault:0xva017")).toBe(true);
  });

  it("starts after a given version", async () => {
    primeAndFund(t, ONE, ALICE, 100_000_000n);
    t.service.vault.deposit(ALICE, 100_000_000n, ALICE);

    const page = await readPage(await t.app.request("/api/v1/events/vault%3A0xva017?afterVersion=1"));
    expect(page.data.map((e) => e.version)).toEqual([2]);
  });

  it("returns empty list for non-existent stream", async () => {
    const res = await t.app.request("/api/v1/events/nonexistent");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: [], pagination: { cursor: null, hasMore: false } });
  });
});
