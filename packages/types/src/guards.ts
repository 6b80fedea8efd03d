/**
 * Runtime Type Guards
 *
 * Narrowing functions used at system boundaries
 * (API inputs, deserialized events, payload validation).
 */

import type { Address } from "./address.js";
import { isZeroAddress } from "./address.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

const EVENT_SOURCES = new Set<string>(["oracle", "vault"]);
const UINT_PATTERN = /^(0|[1-9]\d*)$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && value.length > 0 && !isZeroAddress(value);
}

/**
 * A non-negative integer rendered as a decimal string ("0", "1500000").
 */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && UINT_PATTERN.test(value);
}

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  return (
    "eventId" in value &&
    typeof value.eventId === "string" &&
    "timestamp" in value &&
    typeof value.timestamp === "string" &&
    "actor" in value &&
    typeof value.actor === "string" &&
    "correlationId" in value &&
    typeof value.correlationId === "string" &&
    "source" in value &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  return (
    "type" in value &&
    typeof value.type === "string" &&
    value.type.length > 0 &&
    "metadata" in value &&
    isEventMetadata(value.metadata) &&
    "payload" in value &&
    value.payload !== null &&
    typeof value.payload === "object"
  );
}
