/**
 * Request ID middleware. Reuses a well-formed incoming x-request-id,
 * otherwise mints a UUID, and echoes it on the response.
 */
import { randomUUID } from "node:crypto";

import type { MiddlewareHandler } from "hono";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

/**
 * Incoming ids are trusted only if short and header-safe.
 */
export function resolveRequestId(incoming: string | undefined): string {
  return incoming !== undefined && REQUEST_ID_PATTERN.test(incoming)
    ? incoming
    : randomUUID();
}

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = resolveRequestId(c.req.header("x-request-id"));

  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  const startedAt = Date.now();
  await next();

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - startedAt,
    },
    `${c.req.method} ${c.req.path} ${c.res.status}`,
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
