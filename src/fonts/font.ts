import type { Font, Glyph } from "./types";

// Read-only view of a font's glyphs; the backing Map never leaves this class
export class GlyphTable implements ReadonlyMap<string, Glyph> {
  readonly #glyphs: Map<string, Glyph>;

  constructor(glyphs: Iterable<[string, Glyph]>) {
    this.#glyphs = new Map();
    for (const [ch, rows] of glyphs) {
      this.#glyphs.set(ch, Object.freeze([...rows]));
    }
    Object.freeze(this);
  }

  get size(): number {
    return this.#glyphs.size;
  }

  get(ch: string): Glyph | undefined {
    return this.#glyphs.get(ch);
  }

  has(ch: string): boolean {
    return this.#glyphs.has(ch);
  }

  forEach(callback: (glyph: Glyph, ch: string, table: ReadonlyMap<string, Glyph>) => void): void {
    for (const [ch, glyph] of this.#glyphs) callback(glyph, ch, this);
  }

  entries() {
    return this.#glyphs.entries();
  }

  keys() {
    return this.#glyphs.keys();
  }

  values() {
    return this.#glyphs.values();
  }

  [Symbol.iterator]() {
    return this.#glyphs.entries();
  }
}

/**
 * Build a frozen font. Only the loader calls this, after it has checked
 * that every glyph has exactly `height` rows.
 */
export function createFont(
  width: number,
  height: number,
  spacing: number,
  glyphs: Iterable<[string, Glyph]>
): Font {
  return Object.freeze({ width, height, spacing, glyphs: new GlyphTable(glyphs) });
}

export function glyphFor(font: Font, ch: string): Glyph | undefined {
  return font.glyphs.get(ch);
}

// Stand-in for characters the font does not define
export function blankGlyph(font: Font): Glyph {
  const row = " ".repeat(font.width);
  return Array.from({ length: font.height }, () => row);
}

export function hasGlyph(font: Font, ch: string): boolean {
  return font.glyphs.has(ch);
}
