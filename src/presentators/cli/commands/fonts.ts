import path from "node:path";
import { loadFontFromFile, saveFontToFile } from "../../../fonts/font-io";
import { createFontResolver, type FontSummary } from "../../../fonts/resolve";
import type { FontsOptions } from "../types";
import { exitWithError, formatFontError, requireArgument } from "../utils/errors";
import { loadCliConfig } from "./render";

function formatSummary(s: FontSummary): string {
  const size = s.width !== undefined && s.height !== undefined ? `${s.width}x${s.height}` : "?";
  const detail = s.error ? `error: ${s.error}` : `${size}, spacing ${s.spacing ?? "?"}, ${s.glyphCount ?? 0} glyphs`;
  const where = s.path ? ` (${s.path})` : "";
  return `${s.name.padEnd(14)} ${s.source.padEnd(8)} ${detail}${where}`;
}

export async function cmdFontsList(options: FontsOptions): Promise<void> {
  const config = await loadCliConfig(options.config);
  const summaries = await createFontResolver(config).list();
  console.log(summaries.map(formatSummary).join("\n"));
}

export async function cmdFontsCheck(fontPath: string | undefined): Promise<void> {
  requireArgument(fontPath, "Missing <path>. Example: blockart fonts check ./my-font.json");
  const result = await loadFontFromFile(path.resolve(fontPath));
  if (!result.ok) {
    exitWithError(formatFontError(result.error));
  }
  const { font } = result;
  console.log(`OK: ${font.width}x${font.height}, spacing ${font.spacing}, ${font.glyphs.size} glyphs`);
}

export async function cmdFontsExport(
  name: string | undefined,
  outPath: string | undefined,
  options: FontsOptions
): Promise<void> {
  requireArgument(name, "Usage: blockart fonts export <name> <path>");
  requireArgument(outPath, "Usage: blockart fonts export <name> <path>");
  const config = await loadCliConfig(options.config);
  const result = await createFontResolver(config).resolve(name);
  if (!result.ok) {
    exitWithError(formatFontError(result.error));
  }
  const target = path.resolve(outPath);
  await saveFontToFile(result.font, target);
  console.log(`Exported font '${name}' to ${target}`);
}
