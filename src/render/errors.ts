export type RenderErrorReason = "MissingText" | "InvalidOption";

export class RenderError extends Error {
  reason: RenderErrorReason;

  constructor(reason: RenderErrorReason, message: string) {
    super(message);
    this.name = "RenderError";
    this.reason = reason;
  }
}

export function isRenderError(err: unknown): err is RenderError {
  return err instanceof RenderError;
}

/**
 * Ensures a spacing-like option is a non-negative integer
 */
export function assertCount(value: number, name: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new RenderError("InvalidOption", `${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}
