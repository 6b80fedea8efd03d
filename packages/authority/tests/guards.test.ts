/**
 * Tests for ReentrancyGuard, PauseSwitch and the timelock evaluator.
 */

import { describe, it, expect } from "vitest";
import { ReentrancyGuard } from "../src/reentrancy-guard.js";
import { PauseSwitch } from "../src/pause-switch.js";
import { ORACLE_TIMELOCK_SECONDS, evaluateTimelock } from "../src/timelock.js";

// =============================================================================
// ReentrancyGuard
// =============================================================================

describe("ReentrancyGuard", () => {
  it("returns the body's result", () => {
    expect(new ReentrancyGuard().run(() => 7)).toBe(7);
  });

  it("rejects a nested call", () => {
    const guard = new ReentrancyGuard();
    expect(() => guard.run(() => guard.run(() => 1))).toThrow(
      expect.objectContaining({ code: "REENTRANT_CALL" }),
    );
  });

  it("releases after the body throws", () => {
    const guard = new ReentrancyGuard();
    expect(() =>
      guard.run(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(guard.entered).toBe(false);
    expect(guard.run(() => "again")).toBe("again");
  });
});

// =============================================================================
// PauseSwitch
// =============================================================================

describe("PauseSwitch", () => {
  it("toggles", () => {
    const sw = new PauseSwitch();
    sw.pause();
    expect(sw.paused).toBe(true);
    sw.unpause();
    expect(sw.paused).toBe(false);
  });

  it("rejects pausing twice", () => {
    const sw = new PauseSwitch();
    sw.pause();
    expect(() => sw.pause()).toThrow(expect.objectContaining({ code: "ENFORCED_PAUSE" }));
  });

  it("rejects unpausing when running", () => {
    expect(() => new PauseSwitch().unpause()).toThrow(expect.objectContaining({ code: "EXPECTED_PAUSE" }));
  });

  it("assertNotPaused throws only when paused", () => {
    const sw = new PauseSwitch();
    expect(() => sw.assertNotPaused()).not.toThrow();
    sw.pause();
    expect(() => sw.assertNotPaused()).toThrow(expect.objectContaining({ code: "ENFORCED_PAUSE" }));
  });
});

// =============================================================================
// Timelock
// =============================================================================

describe("evaluateTimelock", () => {
  const pending = { target: "0x0rac1e2", queuedAt: 1_000 };

  it("reports nothing pending", () => {
    expect(evaluateTimelock(undefined, 5_000, ORACLE_TIMELOCK_SECONDS)).toEqual({
      ready: false,
      reason: "NOTHING_PENDING",
    });
  });

  it("is locked one second before the delay elapses", () => {
    expect(evaluateTimelock(pending, 1_000 + ORACLE_TIMELOCK_SECONDS - 1, ORACLE_TIMELOCK_SECONDS)).toEqual({
      ready: false,
      reason: "TIMELOCKED",
      readyAt: 87_400,
    });
  });

  it("is ready exactly when the delay elapses", () => {
    expect(evaluateTimelock(pending, 87_400, ORACLE_TIMELOCK_SECONDS)).toEqual({
      ready: true,
      target: "0x0rac1e2",
    });
  });
});
