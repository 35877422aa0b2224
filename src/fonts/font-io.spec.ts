import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FontError } from "./errors";
import { loadFontFromFile, saveFontToFile, toFontDocument } from "./font-io";
import { HASH_FONT_DOC, mustLoad } from "./fixtures.test.support";

describe("font file I/O", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "blockart-fonts-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads a font document from disk", async () => {
    const file = path.join(dir, "hash.json");
    await writeFile(file, JSON.stringify(HASH_FONT_DOC), "utf8");
    const result = await loadFontFromFile(file);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.font.glyphs.get("B")).toEqual(["@", "@"]);
  });

  it("reports a missing file as IoError", async () => {
    const result = await loadFontFromFile(path.join(dir, "missing.json"));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe("IoError");
    expect(result.error.message).toContain("missing.json");
  });

  it("reports malformed file content as ParseError", async () => {
    const file = path.join(dir, "broken.json");
    await writeFile(file, "{", "utf8");
    const result = await loadFontFromFile(file);
    expect(result.ok ? "ok" : result.error.reason).toBe("ParseError");
  });

  it("converts a font back into a document", () => {
    expect(toFontDocument(mustLoad(HASH_FONT_DOC))).toEqual({
      width: 1,
      height: 2,
      spacing: 0,
      glyphs: { A: ["#", "#"], B: ["@", "@"] },
    });
  });

  it("saves pretty JSON that loads back to the same font", async () => {
    const file = path.join(dir, "out.json");
    const font = mustLoad(HASH_FONT_DOC);
    await saveFontToFile(font, file);
    const text = await readFile(file, "utf8");
    expect(text.endsWith("}\n")).toBe(true);
    expect(text.split("\n")[1]).toBe('  "width": 1,');
    const reloaded = await loadFontFromFile(file);
    expect(reloaded.ok && toFontDocument(reloaded.font)).toEqual(toFontDocument(font));
  });

  it("throws IoError when the target directory does not exist", async () => {
    const file = path.join(dir, "nope", "out.json");
    await expect(saveFontToFile(mustLoad(HASH_FONT_DOC), file)).rejects.toBeInstanceOf(FontError);
    await expect(saveFontToFile(mustLoad(HASH_FONT_DOC), file)).rejects.toMatchObject({ reason: "IoError" });
  });
});
