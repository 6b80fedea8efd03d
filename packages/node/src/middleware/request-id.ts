/**
 * Request ID middleware.
 *
 * Propagates an incoming X-Request-Id when it is a short token of safe
 * characters; anything else is replaced with a fresh UUID. The ID is
 * echoed on the response and tags the request log line.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const SAFE_REQUEST_ID = /^[A-Za-z0-9._:-]{1,128}$/;

export function requestIdMiddleware(generate: () => string = randomUUID): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId = incoming !== undefined && SAFE_REQUEST_ID.test(incoming) ? incoming : generate();

    c.set("requestId", requestId);
    await next();
    c.header(REQUEST_ID_HEADER, requestId);
  };
}
