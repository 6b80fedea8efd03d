/**
 * Two-phase timelocked change.
 *
 * Phase 1 records `(target, queuedAt)`. Phase 2 may apply the target once
 * `now >= queuedAt + delay`. Evaluation is a pure function of the pending
 * state and the current time; the owner applies the decision.
 */

/** Fixed delay before a queued price-source change can execute (1 day). */
export const ORACLE_TIMELOCK_SECONDS = 86_400;

export interface PendingChange<T> {
  readonly target: T;
  readonly queuedAt: number;
}

export type TimelockDecision<T> =
  | { readonly ready: true; readonly target: T }
  | { readonly ready: false; readonly reason: "NOTHING_PENDING" }
  | { readonly ready: false; readonly reason: "TIMELOCKED"; readonly readyAt: number };

export function readyAt(pending: PendingChange<unknown>, delaySeconds: number): number {
  return pending.queuedAt + delaySeconds;
}

export function evaluateTimelock<T>(
  pending: PendingChange<T> | undefined,
  now: number,
  delaySeconds: number,
): TimelockDecision<T> {
  if (pending === undefined) {
    return { ready: false, reason: "NOTHING_PENDING" };
  }
  const at = readyAt(pending, delaySeconds);
  if (now < at) {
    return { ready: false, reason: "TIMELOCKED", readyAt: at };
  }
  return { ready: true, target: pending.target };
}
