import { describe, it, expect } from "vitest";
import { getBundledFont, getDefaultFont, isBundledFontName, listBundledFonts } from "./registry";
import { glyphFor } from "./font";

describe("bundled fonts", () => {
  it("lists every bundled font", () => {
    expect(listBundledFonts()).toEqual(["default", "ansi-compact", "mini"]);
  });

  it("loads each bundled font with its declared cell", () => {
    expect(getDefaultFont()).toMatchObject({ width: 7, height: 7, spacing: 1 });
    expect(getBundledFont("ansi-compact")).toMatchObject({ width: 6, height: 4, spacing: 0 });
    expect(getBundledFont("mini")).toMatchObject({ width: 2, height: 2, spacing: 0 });
  });

  it("covers letters, digits and punctuation", () => {
    expect(getDefaultFont().glyphs.size).toBe(87);
    expect(getBundledFont("ansi-compact").glyphs.size).toBe(87);
    expect(getBundledFont("mini").glyphs.size).toBe(85);
  });

  it("returns the same instance on every call", () => {
    expect(getBundledFont("mini")).toBe(getBundledFont("mini"));
    expect(getDefaultFont()).toBe(getBundledFont("default"));
  });

  it("exposes glyph data from the bundled documents", () => {
    expect(glyphFor(getBundledFont("mini"), "A")).toEqual(["▄▖", "▌▌"]);
    expect(glyphFor(getBundledFont("ansi-compact"), "H")).toEqual([
      "██ ██",
      "██▄██",
      "██ ██",
      "     ",
    ]);
  });

  it("recognises bundled names only", () => {
    expect(isBundledFontName("mini")).toBe(true);
    expect(isBundledFontName("ansi-compact")).toBe(true);
    expect(isBundledFontName("toString")).toBe(false);
    expect(isBundledFontName("banner")).toBe(false);
  });
});
