// Core font types

export type Glyph = readonly string[]; // exactly `height` rows, stored verbatim

export type Font = {
  readonly width: number; // columns per glyph cell
  readonly height: number; // rows per glyph cell
  readonly spacing: number; // blank columns between adjacent glyphs
  readonly glyphs: ReadonlyMap<string, Glyph>;
};

// On-disk / over-the-wire shape of a font, before validation
export type FontDocument = {
  width: number;
  height: number;
  spacing?: number;
  glyphs: Record<string, string[]>;
};
