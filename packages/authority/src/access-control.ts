/**
 * Access Control — principal → set of roles.
 *
 * Rules:
 * - Only DEFAULT_ADMIN holders grant or revoke
 * - Any principal may renounce its own roles
 * - The zero address never holds a role
 * - Grant/revoke report whether membership changed, so owners emit
 *   role events only for real transitions
 */

import type { Address } from "@navledger/types";
import { isZeroAddress } from "@navledger/types";
import type { Role } from "./types.js";
import { AuthorityError, ROLES } from "./types.js";

export type RoleAssignment = readonly [Role, Address];

export class AccessControl {
  private readonly _members = new Map<Role, Set<Address>>();

  /**
   * @param initial - bootstrap grants, applied without an admin check
   * @throws AuthorityError INVALID_ROLE_MEMBER for a zero address
   */
  constructor(initial: readonly RoleAssignment[] = []) {
    for (const [role, account] of initial) {
      this._assertMember(account);
      this._add(role, account);
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  hasRole(role: Role, account: Address): boolean {
    return this._members.get(role)?.has(account) ?? false;
  }

  /**
   * @throws AuthorityError UNAUTHORIZED when `account` lacks `role`
   */
  assertRole(role: Role, account: Address): void {
    if (!this.hasRole(role, account)) {
      throw new AuthorityError("UNAUTHORIZED", `Account ${account} is missing role ${role}`);
    }
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /** @returns true if the account did not already hold the role */
  grantRole(caller: Address, role: Role, account: Address): boolean {
    this.assertRole(ROLES.DEFAULT_ADMIN, caller);
    this._assertMember(account);
    return this._add(role, account);
  }

  /** @returns true if the account held the role */
  revokeRole(caller: Address, role: Role, account: Address): boolean {
    this.assertRole(ROLES.DEFAULT_ADMIN, caller);
    return this._members.get(role)?.delete(account) ?? false;
  }

  /** @returns true if the caller held the role */
  renounceRole(caller: Address, role: Role): boolean {
    return this._members.get(role)?.delete(caller) ?? false;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _add(role: Role, account: Address): boolean {
    let members = this._members.get(role);
    if (members === undefined) {
      members = new Set();
      this._members.set(role, members);
    }
    if (members.has(account)) {
      return false;
    }
    members.add(account);
    return true;
  }

  private _assertMember(account: Address): void {
    if (isZeroAddress(account)) {
      throw new AuthorityError("INVALID_ROLE_MEMBER", "The zero address cannot hold a role");
    }
  }
}
