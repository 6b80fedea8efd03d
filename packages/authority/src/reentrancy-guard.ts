/**
 * Blanket non-reentrancy for an instance's mutating entry points.
 *
 * Every mutating method runs its body through `run()`. A mutating call
 * made while another is still on the stack, from a callback or a token
 * hook, fails before it touches state.
 */

import { AuthorityError } from "./types.js";

export class ReentrancyGuard {
  private _entered = false;

  get entered(): boolean {
    return this._entered;
  }

  run<T>(body: () => T): T {
    if (this._entered) {
      throw new AuthorityError("REENTRANT_CALL", "Reentrant call");
    }
    this._entered = true;
    try {
      return body();
    } finally {
      this._entered = false;
    }
  }
}
