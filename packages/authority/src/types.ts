/**
 * @navledger/authority — Roles and errors.
 */

// =============================================================================
// Roles
// =============================================================================

/**
 * Capabilities a principal can hold.
 *
 * - DEFAULT_ADMIN: configuration, role management, fee sweep, rescue, oracle timelock
 * - OPERATOR: liquidity movement, staleness tuning
 * - GUARDIAN: pause / unpause
 * - REPORTER: NAV reports (oracle only)
 */
export const ROLES = {
  DEFAULT_ADMIN: "DEFAULT_ADMIN_ROLE",
  OPERATOR: "OPERATOR_ROLE",
  GUARDIAN: "GUARDIAN_ROLE",
  REPORTER: "REPORTER_ROLE",
} as const;

export type Role = (typeof ROLES)[keyof typeof ROLES];

const ROLE_VALUES = new Set<string>(Object.values(ROLES));

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLE_VALUES.has(value);
}

// =============================================================================
// Error
// =============================================================================

export type AuthorityErrorCode =
  | "UNAUTHORIZED"
  | "ENFORCED_PAUSE"
  | "EXPECTED_PAUSE"
  | "REENTRANT_CALL"
  | "INVALID_ROLE_MEMBER";

export class AuthorityError extends Error {
  public readonly code: AuthorityErrorCode;

  constructor(code: AuthorityErrorCode, message: string) {
    super(message);
    this.name = "AuthorityError";
    this.code = code;
  }
}
