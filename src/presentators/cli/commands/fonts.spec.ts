import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { resetConfigCache } from "../../../config";
import { loadFontFromFile } from "../../../fonts/font-io";
import { HASH_FONT_DOC } from "../../../fonts/fixtures.test.support";
import { cmdFontsCheck, cmdFontsExport } from "./fonts";

describe("fonts commands", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "blockart-fonts-cli-"));
    resetConfigCache();
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    resetConfigCache();
    await rm(dir, { recursive: true, force: true });
  });

  it("reports a valid font", async () => {
    const file = path.join(dir, "hash.json");
    await writeFile(file, JSON.stringify(HASH_FONT_DOC), "utf8");
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    await cmdFontsCheck(file);
    expect(log).toHaveBeenCalledWith("OK: 1x2, spacing 0, 2 glyphs");
  });

  it("reports the failing glyph", async () => {
    const file = path.join(dir, "short.json");
    await writeFile(file, JSON.stringify({ width: 1, height: 2, glyphs: { A: ["#"] } }), "utf8");
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    await expect(cmdFontsCheck(file)).rejects.toThrow("exit 1");
    expect(error).toHaveBeenCalledWith('GlyphHeightMismatch (glyph "A"): Glyph "A" has 1 rows, expected 2');
  });

  it("exports a bundled font", async () => {
    const out = path.join(dir, "mini.json");
    vi.spyOn(console, "log").mockImplementation(() => {});
    await cmdFontsExport("mini", out, { config: path.join(dir, "absent.json") });
    const result = await loadFontFromFile(out);
    expect(result.ok && result.font.glyphs.size).toBe(85);
  });
});
