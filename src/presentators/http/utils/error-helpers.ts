// Shared Hono error utilities to keep handlers DRY

import { isFontError } from "../../../fonts/errors";
import { isRenderError } from "../../../render/errors";

export function isErrorWithStatus(err: unknown): err is Error & { status: number } {
  if (!(err instanceof Error)) return false;
  const withStatus: Error & { status?: unknown } = err;
  return typeof withStatus.status === "number";
}

export type ErrorBody = {
  error: { type: string; message: string };
};

export function statusForError(err: unknown): number {
  if (isErrorWithStatus(err)) return err.status;
  if (isFontError(err)) return err.reason === "UnknownFont" ? 404 : 400;
  if (isRenderError(err)) return 400;
  return 500;
}

export function errorType(err: unknown, status: number): string {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    if (typeof code === "string" && code.trim()) return code;
  }
  if (isFontError(err) || isRenderError(err)) return err.reason;
  if (status === 404) return "not_found";
  if (status >= 500) return "internal_error";
  return "bad_request";
}

export function toErrorBody(message: string, type: string): ErrorBody {
  return { error: { type, message } };
}
