/**
 * Authentication types.
 *
 * Both strategies resolve to a ledger address. What that address may do is
 * decided by the oracle's and the vault's own role tables, not here.
 *
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header (sub = address)
 */

import { z } from "zod";
import type { Address } from "@navledger/types";

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "header";
  readonly address: Address;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly address: Address;
}

export const JwtClaimsSchema = z.object({
  sub: z.string().min(1),
  iss: z.string().default(""),
  exp: z.number().int(),
  iat: z.number().int(),
});

export type JwtClaims = z.infer<typeof JwtClaimsSchema>;
