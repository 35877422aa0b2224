import defaultFontDocument from "./data/default.json";
import ansiCompactFontDocument from "./data/ansi-compact.json";
import miniFontDocument from "./data/mini.json";
import { loadFontFromDocument } from "./loader";
import type { Font } from "./types";

const BUNDLED_FONTS = {
  default: defaultFontDocument,
  "ansi-compact": ansiCompactFontDocument,
  mini: miniFontDocument,
} as const;

export type BundledFontName = keyof typeof BUNDLED_FONTS;

const loaded = new Map<BundledFontName, Font>();

export function isBundledFontName(value: string): value is BundledFontName {
  return Object.prototype.hasOwnProperty.call(BUNDLED_FONTS, value);
}

export function listBundledFonts(): BundledFontName[] {
  return ["default", "ansi-compact", "mini"];
}

// Bundled documents go through the same validation as user fonts, once per process.
export function getBundledFont(name: BundledFontName): Font {
  const cached = loaded.get(name);
  if (cached) return cached;
  const result = loadFontFromDocument(BUNDLED_FONTS[name]);
  if (!result.ok) {
    throw new Error(`Bundled font '${name}' is invalid: ${result.error.message}`);
  }
  loaded.set(name, result.font);
  return result.font;
}

export function getDefaultFont(): Font {
  return getBundledFont("default");
}
