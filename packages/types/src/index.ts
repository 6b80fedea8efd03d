/**
 * @navledger/types — Shared primitives for the NAV ledger stack.
 *
 * - Principals (addresses)
 * - Time (clocks, unix seconds)
 * - Event architecture
 * - Runtime guards for boundary validation
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

export type { Address } from "./address.js";
export { ZERO_ADDRESS, isZeroAddress } from "./address.js";

export type { Clock } from "./clock.js";
export { SystemClock, ManualClock, toIsoTimestamp } from "./clock.js";

export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

export {
  isAddress,
  isUintString,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
