import type { ErrorHandler } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { errorType, statusForError, toErrorBody } from "./error-helpers";
import { logError, logWarn } from "../../../utils/logging/log-helpers";

export function createGlobalErrorHandler(): ErrorHandler {
  return (err, c) => {
    const status = statusForError(err);
    const context = { requestId: c.get("requestId") };
    if (status >= 500) logError("Unhandled error", err, context);
    else logWarn(`${status} ${err.message}`, undefined, context);

    const message = status >= 500 ? "Internal server error" : err.message;
    return c.json(toErrorBody(message, errorType(err, status)), status as ContentfulStatusCode);
  };
}
