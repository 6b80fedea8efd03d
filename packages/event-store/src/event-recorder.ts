/**
 * @navledger/event-store — Unit-of-work event recorder.
 *
 * A component wraps each mutating operation in `record()`. Events emitted
 * during the operation are buffered and appended to the component's stream
 * in a single batch when the operation returns. If the operation throws,
 * the buffer is discarded and the store is untouched.
 *
 * A `record()` call made while another is in progress joins the enclosing
 * operation: its events share the outer correlation ID and commit with it.
 */

import { randomUUID } from "node:crypto";
import type { Address, Clock, DomainEvent, EventSource } from "@navledger/types";
import { toIsoTimestamp } from "@navledger/types";
import type { EventCatalog } from "./catalog.js";
import type { AppendResult, EventStore } from "./types.js";
import { EventStoreError } from "./types.js";

/** Event type → payload shape. */
export type EventMap = { readonly [type: string]: Readonly<Record<string, unknown>> };

export interface EventEmitter<TEvents extends EventMap> {
  emit<K extends keyof TEvents & string>(type: K, payload: TEvents[K]): void;
}

export interface EventRecorderOptions {
  readonly store: EventStore;
  readonly streamId: string;
  readonly source: EventSource;
  readonly clock: Clock;
  /** When given, every payload is validated before it is buffered. */
  readonly catalog?: EventCatalog;
}

interface Operation {
  readonly actor: Address;
  readonly correlationId: string;
  readonly events: DomainEvent[];
}

export class EventRecorder<TEvents extends EventMap> {
  private readonly _options: EventRecorderOptions;
  private _current: Operation | undefined;
  private _lastAppend: AppendResult | undefined;

  constructor(options: EventRecorderOptions) {
    this._options = options;
  }

  get streamId(): string {
    return this._options.streamId;
  }

  /** Result of the most recent committed batch, if any. */
  get lastAppend(): AppendResult | undefined {
    return this._lastAppend;
  }

  /**
   * Run `work` as one operation on behalf of `actor`.
   */
  record<T>(actor: Address, work: (events: EventEmitter<TEvents>) => T): T {
    const enclosing = this._current;
    if (enclosing !== undefined) {
      return work(this._emitterFor(enclosing));
    }

    const operation: Operation = { actor, correlationId: randomUUID(), events: [] };
    this._current = operation;
    try {
      const result = work(this._emitterFor(operation));
      if (operation.events.length > 0) {
        this._lastAppend = this._options.store.append(this._options.streamId, operation.events);
      }
      return result;
    } finally {
      this._current = undefined;
    }
  }

  private _emitterFor(operation: Operation): EventEmitter<TEvents> {
    return {
      emit: (type, payload) => {
        this._validate(type, payload);
        const { store, streamId, source, clock } = this._options;
        const sequence = store.streamVersion(streamId) + operation.events.length + 1;
        operation.events.push({
          type,
          metadata: {
            eventId: `${streamId}:${sequence}`,
            timestamp: toIsoTimestamp(clock.now()),
            actor: operation.actor,
            correlationId: operation.correlationId,
            source,
          },
          payload,
        });
      },
    };
  }

  private _validate(type: string, payload: unknown): void {
    const catalog = this._options.catalog;
    if (catalog === undefined) {
      return;
    }
    if (!catalog.has(type)) {
      throw new EventStoreError("UNKNOWN_EVENT_TYPE", `Event type "${type}" is not in the catalog`, this.streamId);
    }
    if (!catalog.validate(type, payload)) {
      throw new EventStoreError("INVALID_PAYLOAD", `Payload for "${type}" does not match its schema`, this.streamId);
    }
  }
}
