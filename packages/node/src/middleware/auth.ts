/**
 * Authentication middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 signature verify
 *
 * Either resolves to a ledger address, set as `c.set("auth", ...)`. A
 * request with no credentials continues anonymously; a request with bad
 * credentials is refused with 401. Mutating routes call `requireCaller()`.
 */

import { createHmac } from "node:crypto";
import type { Context, MiddlewareHandler } from "hono";
import type { Address } from "@navledger/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, JwtClaims } from "../types/auth.js";
import { JwtClaimsSchema } from "../types/auth.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

export const CALLER_HEADER = "X-Caller-Address";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** JWT HMAC secret (if JWT auth is enabled) */
  readonly jwtSecret?: string | undefined;
  /** Expected JWT issuer */
  readonly jwtIssuer?: string | undefined;
}

/**
 * Secured mode: tries X-Api-Key first, then Authorization: Bearer.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let auth: AuthContext | undefined;

    const apiKey = c.req.header("X-Api-Key");
    if (apiKey !== undefined) {
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        return c.json(createErrorEnvelope("UNAUTHENTICATED", "Invalid API key"), 401);
      }
      auth = { type: "api-key", address: record.address };
    }

    if (auth === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        if (config.jwtSecret === undefined) {
          return c.json(createErrorEnvelope("UNAUTHENTICATED", "JWT authentication not configured"), 401);
        }
        const claims = verifyJwt(authHeader.slice(7), config.jwtSecret, config.jwtIssuer);
        if (claims === undefined) {
          return c.json(createErrorEnvelope("UNAUTHENTICATED", "Invalid or expired JWT"), 401);
        }
        auth = { type: "jwt", address: claims.sub };
      }
    }

    c.set("auth", auth);
    return next();
  };
}

/**
 * Unsecured mode (tests, dev): the caller names itself in X-Caller-Address.
 */
export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const address = c.req.header(CALLER_HEADER);
    c.set("auth", address === undefined || address === "" ? undefined : { type: "header", address });
    return next();
  };
}

/**
 * The authenticated caller's address.
 *
 * @throws ApiError UNAUTHENTICATED when the request carries no identity
 */
export function requireCaller(c: Context<AppEnv>): Address {
  const auth = c.get("auth");
  if (auth === undefined) {
    throw new ApiError("UNAUTHENTICATED", "Authentication required");
  }
  return auth.address;
}

// =============================================================================
// JWT Helpers
// =============================================================================

/**
 * Verify an HS256 JWT.
 *
 * @returns Decoded claims, or undefined if invalid/expired.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): JwtClaims | undefined {
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (headerB64 === undefined || payloadB64 === undefined || signatureB64 === undefined || rest.length > 0) {
    return undefined;
  }

  const expectedSig = createHmac("sha256", secret).update(`${headerB64}.${payloadB64}`).digest("base64url");
  if (expectedSig !== signatureB64) {
    return undefined;
  }

  const header = decodeSegment(headerB64);
  if (typeof header !== "object" || header === null || !("alg" in header) || header.alg !== "HS256") {
    return undefined;
  }

  const parsed = JwtClaimsSchema.safeParse(decodeSegment(payloadB64));
  if (!parsed.success) {
    return undefined;
  }
  const claims = parsed.data;

  if (claims.exp < nowSeconds) {
    return undefined;
  }
  if (expectedIssuer !== undefined && claims.iss !== expectedIssuer) {
    return undefined;
  }
  return claims;
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(claims: Omit<JwtClaims, "iat"> & { iat?: number }, secret: string): string {
  const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");
  const payload = Buffer.from(
    JSON.stringify({ ...claims, iat: claims.iat ?? Math.floor(Date.now() / 1000) }),
  ).toString("base64url");
  const signature = createHmac("sha256", secret).update(`${header}.${payload}`).digest("base64url");
  return `${header}.${payload}.${signature}`;
}

function decodeSegment(segment: string): unknown {
  try {
    return JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
}
