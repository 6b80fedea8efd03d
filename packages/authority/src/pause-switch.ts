/**
 * On/off switch for a component's guarded operations.
 * Callers check the guardian role before flipping it.
 */

import { AuthorityError } from "./types.js";

export class PauseSwitch {
  private _paused = false;

  get paused(): boolean {
    return this._paused;
  }

  pause(): void {
    this.assertNotPaused();
    this._paused = true;
  }

  unpause(): void {
    if (!this._paused) {
      throw new AuthorityError("EXPECTED_PAUSE", "Not paused");
    }
    this._paused = false;
  }

  assertNotPaused(): void {
    if (this._paused) {
      throw new AuthorityError("ENFORCED_PAUSE", "Paused");
    }
  }
}
