/**
 * @navledger/event-store — Core types.
 *
 * Defines the interfaces and types for append-only event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every stored event carries its hash and its predecessor's hash
 * - Concurrency control via expected version (optimistic locking)
 */

import type { DomainEvent, EventMetadata } from "@navledger/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: position within the stream (1-based)
 * - globalPosition: position across all streams (1-based)
 * - hash / previousHash: link in the tamper-evident chain
 */
export interface StoredEvent<TPayload = Readonly<Record<string, unknown>>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: TPayload;
  }>;

  readonly streamId: string;
  readonly version: number;
  readonly globalPosition: number;

  /** When this event was persisted (store clock, not domain clock) */
  readonly appendedAt: string;

  /** SHA-256 of this event's canonical content + previousHash */
  readonly hash: string;

  /** Hash of the preceding event in global order, or "genesis" */
  readonly previousHash: string;
}

/**
 * The hashed fields of a StoredEvent.
 */
export type StoredEventContent = Omit<StoredEvent, "hash" | "previousHash">;

// =============================================================================
// Append / Read Options
// =============================================================================

/**
 * Expected version for optimistic concurrency control.
 *
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist (first write)
 * - "any": no concurrency check
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
  /** Global position of the last appended event */
  readonly lastPosition: number;
}

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;
  readonly maxCount?: number;
  readonly direction?: ReadDirection;
  /** Only events of these types */
  readonly types?: readonly string[];
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last event whose link was checked */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are contiguous with no gaps
 * - Subscribers see events in global order
 */
export interface EventStore {
  /**
   * Append one or more events to a stream, all or nothing.
   *
   * @throws EventStoreError on an empty batch or a concurrency conflict
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the last event in the stream, or 0 */
  streamVersion(streamId: string): number;

  /** Position of the last event in the store, or 0 */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "UNKNOWN_EVENT_TYPE"
  | "INVALID_PAYLOAD";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
