import type { Context, Next } from "hono";
import { logDebug } from "../../../utils/logging/log-helpers";

export const REQUEST_ID_HEADER = "x-request-id";

// Caller-supplied ids are echoed only when short and printable
const ACCEPTED_REQUEST_ID = /^[A-Za-z0-9._-]{1,64}$/;

function newRequestId(): string {
  return Math.random().toString(36).substring(2, 10);
}

/**
 * Tags each request with an id (context variable and response header) and
 * logs method, path, status and duration at debug level once it completes.
 */
export async function requestIdMiddleware(c: Context, next: Next): Promise<void> {
  const supplied = c.req.header(REQUEST_ID_HEADER);
  const requestId = supplied !== undefined && ACCEPTED_REQUEST_ID.test(supplied) ? supplied : newRequestId();
  c.set("requestId", requestId);
  c.header(REQUEST_ID_HEADER, requestId);

  const started = Date.now();
  await next();
  logDebug(`${c.req.method} ${c.req.path} -> ${c.res.status} (${Date.now() - started}ms)`, undefined, { requestId });
}

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
