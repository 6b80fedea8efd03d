/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state transition of the oracle and the vault is captured as a
 * DomainEvent, so the full ledger history can be rebuilt from the log.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Payload amounts are decimal strings of base units, never numbers
 * - No UPDATE, no DELETE — only new events
 */

/** Components that emit events. */
export type EventSource = "oracle" | "vault";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Principal whose call caused this event */
  readonly actor: string;

  /** Shared by every event emitted from one operation */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "oracle.nav.reported", "vault.withdrawal.queued") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
