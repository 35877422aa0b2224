import path from "node:path";
import type { BlockArtConfig } from "../config/types";
import { FontError } from "./errors";
import { loadFontFromFile } from "./font-io";
import type { LoadResult } from "./loader";
import { getBundledFont, isBundledFontName, listBundledFonts } from "./registry";
import type { Font } from "./types";

export type FontSource = "bundled" | "config" | "file";

export type FontSummary = {
  name: string;
  source: FontSource;
  width?: number;
  height?: number;
  spacing?: number;
  glyphCount?: number;
  path?: string;
  error?: string; // set when a configured font fails to load
};

export type FontResolverOptions = {
  allowPaths?: boolean; // accept *.json paths as references (CLI only)
  cwd?: string;
};

export type FontResolver = {
  resolve(ref?: string): Promise<LoadResult>;
  list(): Promise<FontSummary[]>;
};

function summarize(name: string, source: FontSource, font: Font, filePath?: string): FontSummary {
  return {
    name,
    source,
    width: font.width,
    height: font.height,
    spacing: font.spacing,
    glyphCount: font.glyphs.size,
    ...(filePath ? { path: filePath } : {}),
  };
}

/**
 * Resolves font references: bundled names first, then fonts registered in
 * the config file, then (optionally) paths to font documents.
 * Loaded files are cached per absolute path.
 */
export function createFontResolver(
  config: BlockArtConfig,
  options: FontResolverOptions = {}
): FontResolver {
  const cwd = options.cwd ?? process.cwd();
  const cache = new Map<string, Font>();
  const registered = config.fonts ?? {};

  async function loadCached(filePath: string): Promise<LoadResult> {
    const absolute = path.resolve(cwd, filePath);
    const hit = cache.get(absolute);
    if (hit) return { ok: true, font: hit };
    const result = await loadFontFromFile(absolute);
    if (result.ok) cache.set(absolute, result.font);
    return result;
  }

  async function resolve(ref?: string): Promise<LoadResult> {
    const name = ref ?? config.defaults?.font ?? "default";
    if (isBundledFontName(name)) {
      return { ok: true, font: getBundledFont(name) };
    }
    if (Object.prototype.hasOwnProperty.call(registered, name)) {
      return loadCached(registered[name]);
    }
    if (options.allowPaths && name.toLowerCase().endsWith(".json")) {
      return loadCached(name);
    }
    return { ok: false, error: new FontError("UnknownFont", `Unknown font '${name}'`) };
  }

  async function list(): Promise<FontSummary[]> {
    const out: FontSummary[] = listBundledFonts().map((name) => summarize(name, "bundled", getBundledFont(name)));
    for (const [name, filePath] of Object.entries(registered)) {
      if (isBundledFontName(name)) continue;
      const result = await loadCached(filePath);
      out.push(
        result.ok
          ? summarize(name, "config", result.font, filePath)
          : { name, source: "config", path: filePath, error: result.error.message }
      );
    }
    return out;
  }

  return { resolve, list };
}
