import type { DomainEvent } from "@navledger/types";

let counter = 0;

export function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `test:${counter}`,
      timestamp: "2025-01-01T00:00:00.000Z",
      actor: "0xa11ce",
      correlationId: `corr-${counter}`,
      source: "vault",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}

/** Element at `index`, failing the test when absent. */
export function at<T>(items: readonly T[], index: number): T {
  const item = items[index];
  if (item === undefined) {
    throw new Error(`No element at index ${index} (length ${items.length})`);
  }
  return item;
}
