/**
 * Zod validation helpers for route handlers.
 *
 * Failures throw ApiError VALIDATION_ERROR, which the error handler
 * renders as 400 with the individual issues under `details`.
 */

import type { Context } from "hono";
import type { ZodError, ZodTypeAny, z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

/**
 * Parse the JSON request body against `schema`.
 */
export async function readBody<S extends ZodTypeAny>(c: Context<AppEnv>, schema: S): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ApiError("VALIDATION_ERROR", "Invalid JSON in request body");
  }
  return parse(schema, body, "Request body validation failed");
}

/**
 * Parse the query string against `schema`.
 */
export function readQuery<S extends ZodTypeAny>(c: Context<AppEnv>, schema: S): z.output<S> {
  return parse(schema, c.req.query(), "Invalid query parameters");
}

function parse<S extends ZodTypeAny>(schema: S, input: unknown, message: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", message, { issues: formatZodErrors(result.error) });
  }
  return result.data;
}

function formatZodErrors(error: ZodError): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Parse one path parameter against `schema`.
 */
export function readParam<S extends ZodTypeAny>(c: Context<AppEnv>, name: string, schema: S): z.output<S> {
  return parse(schema, c.req.param(name), `Invalid path parameter "${name}"`);
}
