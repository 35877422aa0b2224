import { getBundledFont, getDefaultFont } from "./fonts/registry";
import type { Font } from "./fonts/types";
import { assemble } from "./render/assemble";

export type { Font, FontDocument, Glyph } from "./fonts/types";
export { FontError, isFontError, type FontErrorReason } from "./fonts/errors";
export { glyphFor, blankGlyph, hasGlyph } from "./fonts/font";
export { loadFontFromDocument, loadFontFromJson, type LoadResult } from "./fonts/loader";
export { loadFontFromFile, saveFontToFile, toFontDocument } from "./fonts/font-io";
export {
  getBundledFont,
  getDefaultFont,
  isBundledFontName,
  listBundledFonts,
  type BundledFontName,
} from "./fonts/registry";
export { createFontResolver, type FontResolver, type FontSummary } from "./fonts/resolve";
export { composeLine } from "./render/compose";
export { assemble, alignRow } from "./render/assemble";
export { BlockArtBuilder, createBuilder, type RenderResult } from "./render/builder";
export { RenderError, isRenderError, type RenderErrorReason } from "./render/errors";
export { isAlignment, type Alignment, type AssembleOptions, type ComposedBlock } from "./render/types";

/** Render with the bundled default font, left-aligned, no extra line spacing. */
export function render(text: string): string {
  return assemble(getDefaultFont(), text);
}

export function renderWithFont(text: string, font: Font): string {
  return assemble(font, text);
}

export function renderAnsiCompact(text: string): string {
  return renderWithFont(text, getBundledFont("ansi-compact"));
}

export function renderMini(text: string): string {
  return renderWithFont(text, getBundledFont("mini"));
}
