import { readFile, writeFile } from "node:fs/promises";
import { FontError, describeCause } from "./errors";
import { loadFontFromJson, type LoadResult } from "./loader";
import type { Font, FontDocument } from "./types";

/**
 * Read and validate a font document from disk
 *
 * @returns The loaded font, or a `FontError` with reason `IoError` when the
 * file cannot be read and the usual loader reasons otherwise
 */
export async function loadFontFromFile(filePath: string): Promise<LoadResult> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    return {
      ok: false,
      error: new FontError("IoError", `Cannot read font file ${filePath}: ${describeCause(error)}`, { cause: error }),
    };
  }
  return loadFontFromJson(raw);
}

export function toFontDocument(font: Font): FontDocument {
  const glyphs: Record<string, string[]> = {};
  for (const [ch, rows] of font.glyphs) {
    glyphs[ch] = [...rows];
  }
  return { width: font.width, height: font.height, spacing: font.spacing, glyphs };
}

/**
 * Write a font to disk as pretty-printed JSON
 *
 * @throws FontError with reason `IoError` if the file cannot be written
 */
export async function saveFontToFile(font: Font, filePath: string): Promise<void> {
  const json = JSON.stringify(toFontDocument(font), null, 2) + "\n";
  try {
    await writeFile(filePath, json, "utf8");
  } catch (error) {
    throw new FontError("IoError", `Cannot write font file ${filePath}: ${describeCause(error)}`, { cause: error });
  }
}
