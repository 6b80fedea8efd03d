/**
 * Principal Types
 *
 * Every participant in the system (users, role holders, the vault itself,
 * external liquidity recipients) is identified by an opaque address string.
 *
 * Rules:
 * - Addresses are compared by exact string equality
 * - The zero address means "nobody" and is never a valid principal
 */

/** Opaque principal identifier (e.g. "0xa11ce..."). */
export type Address = string;

/** The "nobody" address. Used for unset referrers and cleared pointers. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/**
 * True when the address is empty or the zero address.
 */
export function isZeroAddress(address: Address): boolean {
  return address === "" || address === ZERO_ADDRESS;
}
