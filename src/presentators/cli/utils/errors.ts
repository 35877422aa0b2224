import { existsSync } from "node:fs";
import type { FontError } from "../../../fonts/errors";

// Thrown for bad invocations; runCli prints the message and exits with 1
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function exitWithError(message: string, code: number = 1): never {
  console.error(message);
  process.exit(code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One-line report of a font failure, naming the glyph when there is one
 *
 * @example
 * formatFontError(err) // 'GlyphHeightMismatch (glyph "A"): Glyph "A" has 1 rows, expected 2'
 */
export function formatFontError(error: FontError): string {
  const where = error.character !== undefined ? ` (glyph ${JSON.stringify(error.character)})` : "";
  return `${error.reason}${where}: ${error.message}`;
}

export function requireArgument<T>(arg: T | undefined, usage: string): asserts arg is T {
  if (arg === undefined) throw new UsageError(usage);
}

export function requireConfigFile(filePath: string): void {
  if (!existsSync(filePath)) {
    exitWithError(`No config file at ${filePath}. Run "blockart config init" to create one.`);
  }
}

export function refuseOverwrite(filePath: string, force: boolean = false): void {
  if (force || !existsSync(filePath)) return;
  exitWithError(`Config already exists: ${filePath} (use --force to overwrite)`);
}
