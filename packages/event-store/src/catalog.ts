/**
 * @navledger/event-store — Event Catalog.
 *
 * Registry of every domain event type with:
 * - A schema version (bumped whenever the payload shape changes)
 * - The subsystem that emits it
 * - A runtime payload validator
 *
 * Unknown event types never validate.
 */

import type { EventSource } from "@navledger/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "vault.withdrawal.queued") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  readonly source: EventSource;

  /** True if the payload is valid for the current schema version. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "oracle.paused",
 *   version: 1,
 *   description: "Guardian paused the oracle",
 *   source: "oracle",
 *   validate: (p) => typeof p === "object" && p !== null,
 * });
 *
 * catalog.validate("oracle.paused", {}); // true
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same version is a no-op; a higher version replaces
   * the current schema.
   *
   * @throws CatalogError when the version is not a positive integer or is
   *   lower than the registered one
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }

    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version > schema.version) {
      throw new CatalogError(
        `Cannot downgrade "${schema.type}" from version ${existing.version} to ${schema.version}`,
      );
    }
    if (existing !== undefined && existing.version === schema.version) {
      return;
    }

    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /** All registered event types, sorted. */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listSchemas(): readonly EventSchema[] {
    return [...this._schemas.values()];
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return this.listSchemas().filter((s) => s.source === source);
  }

  /**
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
