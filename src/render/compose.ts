import { blankGlyph, glyphFor } from "../fonts/font";
import type { Font } from "../fonts/types";
import { displayWidth, padColumnsEnd } from "./text-width";
import type { ComposedBlock } from "./types";

/**
 * Render one line of text (no line breaks) into `font.height` rows.
 *
 * Characters missing from the font become blank cells. Glyph rows shorter
 * than `font.width` are padded to it; longer rows are kept whole and the
 * block is widened so every row ends up the same width.
 */
export function composeLine(font: Font, text: string, spacingOverride?: number): ComposedBlock {
  const spacing = spacingOverride ?? font.spacing;
  const gap = " ".repeat(spacing);
  const chars = Array.from(text);
  const rows: string[] = Array.from({ length: font.height }, () => "");

  chars.forEach((ch, idx) => {
    const glyph = glyphFor(font, ch) ?? blankGlyph(font);
    const isLast = idx === chars.length - 1;
    for (let r = 0; r < font.height; r++) {
      rows[r] += padColumnsEnd(glyph[r], font.width);
      if (!isLast) rows[r] += gap;
    }
  });

  const width = rows.reduce((max, row) => Math.max(max, displayWidth(row)), 0);
  return { rows: rows.map((row) => padColumnsEnd(row, width)), width };
}
