import { createFont } from "./font";
import { FontError, describeCause } from "./errors";
import type { Font, Glyph } from "./types";

export type LoadResult = { ok: true; font: Font } | { ok: false; error: FontError };

function fail(error: FontError): LoadResult {
  return { ok: false, error };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every((row) => typeof row === "string");
}

function isPositiveInteger(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v > 0;
}

function isCount(v: unknown): v is number {
  return typeof v === "number" && Number.isInteger(v) && v >= 0;
}

function readDimension(doc: Record<string, unknown>, field: "width" | "height"): number | FontError {
  const value = doc[field];
  if (value !== undefined && typeof value !== "number") {
    return new FontError("ParseError", `Font ${field} must be a number, got ${typeof value}`);
  }
  if (!isPositiveInteger(value)) {
    return new FontError(
      "InvalidDimensions",
      value === undefined ? `Font ${field} is missing` : `Font ${field} must be a positive integer, got ${value}`
    );
  }
  return value;
}

/**
 * Validate a parsed font document and turn it into a `Font`.
 * Never throws: every problem comes back as a `FontError` with a reason.
 */
export function loadFontFromDocument(doc: unknown): LoadResult {
  if (!isRecord(doc)) {
    return fail(new FontError("ParseError", "Font document must be a JSON object"));
  }

  const width = readDimension(doc, "width");
  if (width instanceof FontError) return fail(width);
  const height = readDimension(doc, "height");
  if (height instanceof FontError) return fail(height);

  const spacing = doc.spacing ?? 0;
  if (typeof spacing !== "number") {
    return fail(new FontError("ParseError", `Font spacing must be a number, got ${typeof spacing}`));
  }
  if (!isCount(spacing)) {
    return fail(new FontError("InvalidDimensions", `Font spacing must be a non-negative integer, got ${spacing}`));
  }

  const glyphs = doc.glyphs;
  if (!isRecord(glyphs)) {
    return fail(new FontError("ParseError", "Font glyphs must be an object mapping characters to rows"));
  }
  const entries = Object.entries(glyphs);
  if (entries.length === 0) {
    return fail(new FontError("EmptyFont", "Font defines no glyphs"));
  }

  const checked: Array<[string, Glyph]> = [];
  for (const [key, rows] of entries) {
    if (Array.from(key).length !== 1) {
      return fail(
        new FontError("InvalidGlyphKey", `Glyph key ${JSON.stringify(key)} must be exactly one character`)
      );
    }
    if (!isStringArray(rows)) {
      return fail(
        new FontError("ParseError", `Glyph ${JSON.stringify(key)} must be an array of strings`, { character: key })
      );
    }
    if (rows.length !== height) {
      return fail(
        new FontError(
          "GlyphHeightMismatch",
          `Glyph ${JSON.stringify(key)} has ${rows.length} rows, expected ${height}`,
          { character: key }
        )
      );
    }
    checked.push([key, rows]);
  }

  return { ok: true, font: createFont(width, height, spacing, checked) };
}

export function loadFontFromJson(text: string): LoadResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text) as unknown;
  } catch (error) {
    return fail(new FontError("ParseError", `Invalid font JSON: ${describeCause(error)}`, { cause: error }));
  }
  return loadFontFromDocument(parsed);
}
