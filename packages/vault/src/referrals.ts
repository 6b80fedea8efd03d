/**
 * Referral Registry — one-time, consent-gated attribution.
 *
 * Each receiver is either unbound or bound to exactly one referrer, and
 * `unbound → bound` is the only transition. Binding happens on the
 * referral-aware deposit paths and is decided in two steps:
 *
 * 1. resolve() — pure, throws before the operation changes anything
 * 2. commit()  — applies a "bind" decision once the operation succeeds
 */

import type { Address } from "@navledger/types";
import { ZERO_ADDRESS, isZeroAddress } from "@navledger/types";
import { VaultError } from "./types.js";

export type ReferralBinding =
  | { readonly kind: "unbound" }
  | { readonly kind: "bound"; readonly referrer: Address };

/**
 * - none: nothing bound, nothing supplied
 * - bind: bind `referrer` now and attribute this flow to it
 * - attribute: already bound; attribute to the original referrer
 */
export type ReferralDecision =
  | { readonly action: "none" }
  | { readonly action: "bind"; readonly referrer: Address }
  | { readonly action: "attribute"; readonly referrer: Address };

export class ReferralRegistry {
  private readonly _referrers = new Map<Address, Address>();

  bindingOf(user: Address): ReferralBinding {
    const referrer = this._referrers.get(user);
    return referrer === undefined ? { kind: "unbound" } : { kind: "bound", referrer };
  }

  /** The bound referrer, or the zero address. */
  referrerOf(user: Address): Address {
    return this._referrers.get(user) ?? ZERO_ADDRESS;
  }

  /**
   * Rules, in order:
   * 1. referrer === receiver fails
   * 2. a bound receiver keeps its referrer; the argument is ignored
   * 3. a zero referrer is a no-op
   * 4. only the receiver itself may bind (caller === receiver)
   *
   * @throws VaultError INVALID_REFERRER
   */
  resolve(caller: Address, receiver: Address, referrer: Address): ReferralDecision {
    if (!isZeroAddress(referrer) && referrer === receiver) {
      throw new VaultError("INVALID_REFERRER", "A receiver cannot refer itself");
    }

    const binding = this.bindingOf(receiver);
    if (binding.kind === "bound") {
      return { action: "attribute", referrer: binding.referrer };
    }
    if (isZeroAddress(referrer)) {
      return { action: "none" };
    }
    if (caller !== receiver) {
      throw new VaultError(
        "INVALID_REFERRER",
        `Only ${receiver} can bind its own referrer (caller: ${caller})`,
      );
    }
    return { action: "bind", referrer };
  }

  /** @returns true when a new binding was written */
  commit(receiver: Address, decision: ReferralDecision): boolean {
    if (decision.action !== "bind" || this._referrers.has(receiver)) {
      return false;
    }
    this._referrers.set(receiver, decision.referrer);
    return true;
  }
}
