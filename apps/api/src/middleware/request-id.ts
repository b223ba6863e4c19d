import type { Context, Next } from "hono";
import { randomUUID } from "node:crypto";

const MAX_INCOMING_ID_LENGTH = 128;

/**
 * Request ID middleware
 * Generates a unique request ID for each request and attaches it to the context
 * The request ID is used for log correlation across the request logger and audit events
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  // Reuse an upstream ID (e.g., from a load balancer) when it looks sane
  const incoming = c.req.header("x-request-id") || c.req.header("x-correlation-id");
  const existingRequestId =
    incoming && incoming.length <= MAX_INCOMING_ID_LENGTH ? incoming : undefined;

  const requestId = existingRequestId || randomUUID();

  c.set("requestId", requestId);

  // Add to response headers for client correlation
  c.header("x-request-id", requestId);

  await next();
}
