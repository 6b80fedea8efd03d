/**
 * Withdrawal Queue — epoch-batched escrow table.
 *
 * Owns the request records only. The vault moves the escrowed shares and
 * pays out; the queue decides whether a request may be claimed or cancelled
 * and records the terminal state.
 *
 * Lifecycle:
 *   open ──claim──▶ claimed
 *     └──cancel──▶ cancelled
 *
 * Rules:
 * - IDs are 1-based, monotonic and never reused
 * - All requests from one epoch share the same claimableAt
 * - Closed requests are kept forever for audit
 */

import type { Address } from "@navledger/types";
import type { ClosedWithdrawalRequest, OpenWithdrawalRequest, WithdrawalRequest } from "./types.js";
import { VaultError } from "./types.js";

/**
 * The first epoch boundary strictly after `requestedAt`.
 */
export function nextEpochBoundary(requestedAt: number, epochSeconds: number): number {
  return Math.floor(requestedAt / epochSeconds) * epochSeconds + epochSeconds;
}

export class WithdrawalQueue {
  private readonly _requests: WithdrawalRequest[] = [];
  private readonly _byOwner = new Map<Address, number[]>();
  private _escrowed = 0n;

  /** Number of requests ever created. */
  get size(): number {
    return this._requests.length;
  }

  /** Shares held for open requests. */
  get escrowed(): bigint {
    return this._escrowed;
  }

  get(id: number): WithdrawalRequest | undefined {
    return Number.isInteger(id) && id >= 1 ? this._requests[id - 1] : undefined;
  }

  /** Every request ID the owner has created, oldest first. */
  requestsOf(owner: Address): readonly number[] {
    return [...(this._byOwner.get(owner) ?? [])];
  }

  // ─── Transitions ───────────────────────────────────────────────────

  enqueue(
    owner: Address,
    receiver: Address,
    shares: bigint,
    now: number,
    epochSeconds: number,
  ): OpenWithdrawalRequest {
    const request: OpenWithdrawalRequest = {
      id: this._requests.length + 1,
      owner,
      receiver,
      sharesEscrow: shares,
      requestedAt: now,
      claimableAt: nextEpochBoundary(now, epochSeconds),
      closed: false,
      status: "open",
    };
    this._requests.push(request);
    this._escrowed += shares;

    const ids = this._byOwner.get(owner);
    if (ids === undefined) {
      this._byOwner.set(owner, [request.id]);
    } else {
      ids.push(request.id);
    }
    return request;
  }

  /**
   * @throws VaultError REQUEST_NOT_FOUND / NOT_OWNER / REQUEST_CLOSED / NOT_CLAIMABLE
   */
  assertClaimable(caller: Address, id: number, now: number): OpenWithdrawalRequest {
    const request = this.assertCancellable(caller, id);
    if (now < request.claimableAt) {
      throw new VaultError(
        "NOT_CLAIMABLE",
        `Withdrawal ${id} is claimable at ${request.claimableAt} (now ${now})`,
      );
    }
    return request;
  }

  /**
   * @throws VaultError REQUEST_NOT_FOUND / NOT_OWNER / REQUEST_CLOSED
   */
  assertCancellable(caller: Address, id: number): OpenWithdrawalRequest {
    const request = this.get(id);
    if (request === undefined) {
      throw new VaultError("REQUEST_NOT_FOUND", `Withdrawal request ${id} does not exist`);
    }
    if (request.owner !== caller) {
      throw new VaultError("NOT_OWNER", `Withdrawal request ${id} belongs to ${request.owner}`);
    }
    if (request.closed) {
      throw new VaultError("REQUEST_CLOSED", `Withdrawal request ${id} is already ${request.status}`);
    }
    return request;
  }

  close(
    request: OpenWithdrawalRequest,
    status: ClosedWithdrawalRequest["status"],
    now: number,
  ): ClosedWithdrawalRequest {
    const closed: ClosedWithdrawalRequest = { ...request, closed: true, status, closedAt: now };
    this._requests[request.id - 1] = closed;
    this._escrowed -= request.sharesEscrow;
    return closed;
  }
}
