/**
 * Event log routes.
 *
 * GET /api/v1/events            — All events in global order (cursor pagination, ?type= filter)
 * GET /api/v1/events/catalog    — Registered event types and their sources
 * GET /api/v1/events/:streamId  — Events of one stream, e.g. "vault:0x..."
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { readQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    const query = readQuery(c, ListEventsQuerySchema);

    const events = service.readAllEvents({
      ...(query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : {}),
      ...(query.type !== undefined ? { types: [query.type] } : {}),
    });

    return c.json(paginate(events, query, (e) => e.globalPosition, "globalPosition"));
  });

  routes.get("/catalog", (c) => {
    const schemas = c.get("service").catalog.listSchemas();
    return c.json({
      data: schemas.map((s) => ({
        type: s.type,
        version: s.version,
        source: s.source,
        description: s.description,
      })),
    });
  });

  routes.get("/:streamId", (c) => {
    const service = c.get("service");
    const query = readQuery(c, ListStreamEventsQuerySchema);

    const events = service.readStreamEvents(
      c.req.param("streamId"),
      query.afterVersion !== undefined ? { fromVersion: query.afterVersion + 1 } : undefined,
    );

    return c.json(paginate(events, query, (e) => e.version, "version"));
  });

  return routes;
}
