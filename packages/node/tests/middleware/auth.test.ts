/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - JWT bearer auth (valid, invalid, expired, wrong issuer)
 * - Caller header in unsecured mode
 * - requireCaller on anonymous requests
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord } from "../../src/types/auth.js";
import {
  authMiddleware,
  callerHeaderMiddleware,
  requireCaller,
  signJwt,
  verifyJwt,
} from "../../src/middleware/auth.js";
import { createErrorHandler } from "../../src/middleware/error-handler.js";

const JWT_SECRET = "test-secret";
const NOW = 1_700_000_000;

function mountRoutes(app: Hono<AppEnv>): Hono<AppEnv> {
  app.onError(createErrorHandler());
  app.get("/whoami", (c) => c.json({ auth: c.get("auth") ?? null }));
  app.post("/act", (c) => c.json({ caller: requireCaller(c) }));
  return app;
}

interface AppAuthOptions {
  readonly apiKeys?: readonly ApiKeyRecord[];
  readonly jwtSecret?: string;
}

function makeApp({ apiKeys = [], jwtSecret }: AppAuthOptions = { jwtSecret: JWT_SECRET }) {
  const app = new Hono<AppEnv>();
  app.use(
    "*",
    authMiddleware({
      apiKeys: new Map(apiKeys.map((k) => [k.key, k])),
      jwtSecret,
      jwtIssuer: "navledger",
    }),
  );
  return mountRoutes(app);
}

describe("API Key auth", () => {
  it("resolves a valid API key to its address", async () => {
    const app = makeApp({ apiKeys: [{ key: "key-1", address: "0xa11ce" }], jwtSecret: JWT_SECRET });

    const res = await app.request("/whoami", {
      headers: { "X-Api-Key": "key-1" },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ auth: { type: "api-key", address: "0xa11ce" } });
  });

  it("returns 401 for an invalid API key", async () => {
    const app = makeApp({ apiKeys: [{ key: "key-1", address: "0xa11ce" }], jwtSecret: JWT_SECRET });

    const res = await app.request("/whoami", {
      headers: { "X-Api-Key": "invalid-key" },
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: { code: "UNAUTHENTICATED", message: "Invalid API key" } });
  });

  it("lets anonymous reads through", async () => {
    const app = makeApp();
    const res = await app.request("/whoami");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ auth: null });
  });

  it("refuses anonymous mutations", async () => {
    const app = makeApp();
    const res = await app.request("/act", { method: "POST" });

    expect(res.status).toBe(401);
    expect(await res.json()).toMatchObject({ error: { code: "UNAUTHENTICATED" } });
  });
});

describe("JWT Bearer auth", () => {
  const future = Math.floor(Date.now() / 1000) + 3600;

  it("resolves a valid JWT to its subject", async () => {
    const app = makeApp();
    const token = signJwt({ sub: "0xb0b", iss: "navledger", exp: future }, JWT_SECRET);

    const res = await app.request("/act", {
      method: "POST",
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ caller: "0xb0b" });
  });

  it("returns 401 for an expired JWT", async () => {
    const app = makeApp();
    const token = signJwt({ sub: "0xb0b", iss: "navledger", exp: Math.floor(Date.now() / 1000) - 100 }, JWT_SECRET);

    const res = await app.request("/whoami", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(401);
  });

  it("returns 401 for a tampered JWT", async () => {
    const app = makeApp();
    const token = signJwt({ sub: "0xb0b", iss: "navledger", exp: future }, JWT_SECRET);
    const tampered = token.slice(0, -5) + "XXXXX";

    const res = await app.request("/whoami", {
      headers: { Authorization: `Bearer ${tampered}` },
    });

    expect(res.status).toBe(401);
  });

  it("returns 401 when JWT auth is not configured", async () => {
    const app = makeApp({ apiKeys: [] });
    const token = signJwt({ sub: "0xb0b", iss: "navledger", exp: future }, JWT_SECRET);

    const res = await app.request("/whoami", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHENTICATED", message: "JWT authentication not configured" },
    });
  });
});

describe("verifyJwt", () => {
  it("returns the claims of a valid token", () => {
    const token = signJwt({ sub: "0xb0b", iss: "navledger", exp: NOW + 60, iat: NOW }, JWT_SECRET);

    expect(verifyJwt(token, JWT_SECRET, "navledger", NOW)).toEqual({
      sub: "0xb0b",
      iss: "navledger",
      exp: NOW + 60,
      iat: NOW,
    });
  });

  it("returns undefined for malformed token", () => {
    expect(verifyJwt("not-a-jwt", JWT_SECRET)).toBeUndefined();
  });

  it("returns undefined for wrong issuer", () => {
    const token = signJwt({ sub: "0xb0b", iss: "wrong-issuer", exp: NOW + 60 }, JWT_SECRET);

    expect(verifyJwt(token, JWT_SECRET, "navledger", NOW)).toBeUndefined();
  });

  it("returns undefined for another secret", () => {
    const token = signJwt({ sub: "0xb0b", iss: "navledger", exp: NOW + 60 }, JWT_SECRET);

    expect(verifyJwt(token, "other-secret", "navledger", NOW)).toBeUndefined();
  });

  it("returns undefined once expired", () => {
    const token = signJwt({ sub: "0xb0b", iss: "navledger", exp: NOW - 1 }, JWT_SECRET);

    expect(verifyJwt(token, JWT_SECRET, "navledger", NOW)).toBeUndefined();
  });

  it("returns undefined without a subject", () => {
    const token = signJwt({ sub: "", iss: "navledger", exp: NOW + 60 }, JWT_SECRET);

    expect(verifyJwt(token, JWT_SECRET, "navledger", NOW)).toBeUndefined();
  });
});

describe("callerHeaderMiddleware", () => {
  function headerApp() {
    const app = new Hono<AppEnv>();
    app.use("*", callerHeaderMiddleware());
    return mountRoutes(app);
  }

  it("takes the caller from X-Caller-Address", async () => {
    const res = await headerApp().request("/act", {
      method: "POST",
      headers: { "X-Caller-Address": "0xa11ce" },
    });

    expect(await res.json()).toEqual({ caller: "0xa11ce" });
  });

  it("treats an empty header as anonymous", async () => {
    const res = await headerApp().request("/whoami", {
      headers: { "X-Caller-Address": "" },
    });

    expect(await res.json()).toEqual({ auth: null });
  });
});
