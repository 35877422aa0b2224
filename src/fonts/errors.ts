export type FontErrorReason =
  | "ParseError"
  | "InvalidDimensions"
  | "InvalidGlyphKey"
  | "GlyphHeightMismatch"
  | "EmptyFont"
  | "IoError"
  | "UnknownFont";

export class FontError extends Error {
  reason: FontErrorReason;
  character?: string;

  constructor(reason: FontErrorReason, message: string, options?: { character?: string; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "FontError";
    this.reason = reason;
    if (options?.character !== undefined) this.character = options.character;
  }
}

export function isFontError(err: unknown): err is FontError {
  return err instanceof FontError;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
