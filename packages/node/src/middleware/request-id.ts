/**
 * Request ID middleware.
 *
 * Reuses the caller's X-Request-Id when it is a token of at most 128
 * letters, digits or `._:-`. Any other value is replaced by a fresh UUID.
 * The id in use is echoed on the response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function acceptedRequestId(header: string | undefined): string | undefined {
  return header !== undefined && REQUEST_ID_PATTERN.test(header) ? header : undefined;
}

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = acceptedRequestId(c.req.header(REQUEST_ID_HEADER)) ?? randomUUID();
    c.set("requestId", requestId);
    await next();
    c.header(REQUEST_ID_HEADER, requestId);
  };
}
