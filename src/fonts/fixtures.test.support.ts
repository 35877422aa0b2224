import { loadFontFromDocument } from "./loader";
import type { Font, FontDocument } from "./types";

export function mustLoad(doc: FontDocument): Font {
  const result = loadFontFromDocument(doc);
  if (!result.ok) throw result.error;
  return result.font;
}

// 1x2 cells, no spacing: A -> "#", B -> "@"
export const HASH_FONT_DOC: FontDocument = {
  width: 1,
  height: 2,
  spacing: 0,
  glyphs: {
    A: ["#", "#"],
    B: ["@", "@"],
  },
};

// 3x2 cells with one short and one over-long glyph
export const MIXED_FONT_DOC: FontDocument = {
  width: 3,
  height: 2,
  spacing: 1,
  glyphs: {
    A: ["AAA", "A A"],
    s: ["s", "ss"],
    W: ["WWWWW", "W W W"],
    X: ["XXXXX", "X"],
  },
};
