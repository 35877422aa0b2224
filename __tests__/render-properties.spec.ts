import { describe, expect, it } from "vitest";
import { assemble, composeLine, getBundledFont, listBundledFonts } from "../src/index";

const SAMPLES = ["Hello, World!", "0123456789", "a b", "?!", "Q%", "mixed CASE 42"];

function columns(row: string): number {
  return Array.from(row).length;
}

describe("render properties", () => {
  for (const name of listBundledFonts()) {
    const font = getBundledFont(name);

    describe(name, () => {
      it("produces height rows per line", () => {
        for (const text of SAMPLES) {
          expect(composeLine(font, text).rows).toHaveLength(font.height);
        }
      });

      it("produces rectangular blocks", () => {
        for (const text of SAMPLES) {
          const block = composeLine(font, text);
          for (const row of block.rows) expect(columns(row)).toBe(block.width);
        }
      });

      it("is at least as wide as the nominal cell layout", () => {
        for (const text of SAMPLES) {
          const n = Array.from(text).length;
          expect(composeLine(font, text).width).toBeGreaterThanOrEqual(n * font.width + (n - 1) * font.spacing);
        }
      });

      it("ignores alignment when every line has the maximum width", () => {
        const text = "AB\nBA\nAB";
        const left = assemble(font, text, { alignment: "left", lineSpacing: 1 });
        expect(assemble(font, text, { alignment: "center", lineSpacing: 1 })).toBe(left);
        expect(assemble(font, text, { alignment: "right", lineSpacing: 1 })).toBe(left);
      });

      it("stacks lines with the requested gap", () => {
        const rows = assemble(font, "ab\ncd\nef", { lineSpacing: 2, alignment: "center" }).split("\n");
        expect(rows).toHaveLength(3 * font.height + 2 * 2);
        expect(new Set(rows.map(columns)).size).toBe(1);
      });
    });
  }
});
