/**
 * @navledger/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only, hash-chained event streams
 * - InMemoryEventStore
 * - EventRecorder for unit-of-work event buffering
 * - EventCatalog and the NAV ledger event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  StoredEventContent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Unit of work
export { EventRecorder } from "./event-recorder.js";
export type { EventEmitter, EventMap, EventRecorderOptions } from "./event-recorder.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// NAV domain events
export { NAV_EVENTS, NAV_EVENT_TYPES, createNavCatalog, isNavEventType } from "./nav-events.js";
export type { NavEventType, NavEventPayloads, OracleEventType, VaultEventType } from "./nav-events.js";
