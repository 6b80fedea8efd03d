/**
 * Tests for AccessControl.
 */

import { describe, it, expect } from "vitest";
import { ZERO_ADDRESS } from "@navledger/types";
import { AccessControl } from "../src/access-control.js";
import { AuthorityError, ROLES, isRole } from "../src/types.js";

const ADMIN = "0xad";
const OPERATOR = "0x0b";
const MALLORY = "0x3a11";

function setup(): AccessControl {
  return new AccessControl([
    [ROLES.DEFAULT_ADMIN, ADMIN],
    [ROLES.OPERATOR, OPERATOR],
  ]);
}

describe("AccessControl", () => {
  it("applies bootstrap grants", () => {
    const access = setup();
    expect(access.hasRole(ROLES.DEFAULT_ADMIN, ADMIN)).toBe(true);
    expect(access.hasRole(ROLES.OPERATOR, OPERATOR)).toBe(true);
    expect(access.hasRole(ROLES.OPERATOR, ADMIN)).toBe(false);
  });

  it("rejects a zero-address bootstrap member", () => {
    expect(() => new AccessControl([[ROLES.GUARDIAN, ZERO_ADDRESS]])).toThrow(
      expect.objectContaining({ code: "INVALID_ROLE_MEMBER" }),
    );
  });

  it("assertRole throws UNAUTHORIZED", () => {
    expect(() => setup().assertRole(ROLES.GUARDIAN, MALLORY)).toThrow(AuthorityError);
    expect(() => setup().assertRole(ROLES.GUARDIAN, MALLORY)).toThrow(
      expect.objectContaining({ code: "UNAUTHORIZED" }),
    );
  });

  describe("grantRole", () => {
    it("lets the admin grant and reports the change", () => {
      const access = setup();
      expect(access.grantRole(ADMIN, ROLES.GUARDIAN, MALLORY)).toBe(true);
      expect(access.grantRole(ADMIN, ROLES.GUARDIAN, MALLORY)).toBe(false);
      expect(access.hasRole(ROLES.GUARDIAN, MALLORY)).toBe(true);
    });

    it("refuses non-admins", () => {
      const access = setup();
      expect(() => access.grantRole(OPERATOR, ROLES.GUARDIAN, OPERATOR)).toThrow(
        expect.objectContaining({ code: "UNAUTHORIZED" }),
      );
      expect(access.hasRole(ROLES.GUARDIAN, OPERATOR)).toBe(false);
    });

    it("refuses the zero address", () => {
      expect(() => setup().grantRole(ADMIN, ROLES.GUARDIAN, ZERO_ADDRESS)).toThrow(
        expect.objectContaining({ code: "INVALID_ROLE_MEMBER" }),
      );
    });
  });

  describe("revokeRole", () => {
    it("lets the admin revoke and reports the change", () => {
      const access = setup();
      expect(access.revokeRole(ADMIN, ROLES.OPERATOR, OPERATOR)).toBe(true);
      expect(access.revokeRole(ADMIN, ROLES.OPERATOR, OPERATOR)).toBe(false);
      expect(access.hasRole(ROLES.OPERATOR, OPERATOR)).toBe(false);
    });

    it("refuses non-admins", () => {
      expect(() => setup().revokeRole(MALLORY, ROLES.OPERATOR, OPERATOR)).toThrow(AuthorityError);
    });
  });

  it("renounceRole only affects the caller", () => {
    const access = setup();
    expect(access.renounceRole(OPERATOR, ROLES.OPERATOR)).toBe(true);
    expect(access.renounceRole(MALLORY, ROLES.DEFAULT_ADMIN)).toBe(false);
    expect(access.hasRole(ROLES.DEFAULT_ADMIN, ADMIN)).toBe(true);
  });

  it("seeds several roles for one account", () => {
    const access = new AccessControl([
      [ROLES.DEFAULT_ADMIN, ADMIN],
      [ROLES.GUARDIAN, ADMIN],
    ]);
    expect(access.hasRole(ROLES.DEFAULT_ADMIN, ADMIN)).toBe(true);
    expect(access.hasRole(ROLES.GUARDIAN, ADMIN)).toBe(true);
    expect(access.hasRole(ROLES.OPERATOR, ADMIN)).toBe(false);
  });

  it("isRole narrows role names", () => {
    expect(isRole("REPORTER_ROLE")).toBe(true);
    expect(isRole("OWNER_ROLE")).toBe(false);
    expect(isRole(7)).toBe(false);
  });
});
