import { isAlignment } from "../../render/types";
import { getArgFlag, getConfigPath, hasFlag, positionalArgs } from "./commands/utils";
import type { ConfigOptions, FontsOptions, RenderOptions, ServeOptions } from "./types";
import { UsageError } from "./utils/errors";

function parseCount(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) throw new UsageError(`--${flag} expects a non-negative integer, got "${value}"`);
  return parseInt(value, 10);
}

// `\n` typed on the command line becomes a line break
function unescapeText(text: string): string {
  return text.replace(/\\n/g, "\n");
}

/**
 * Parse the arguments following `render`
 */
export function parseRenderOptions(args: string[]): RenderOptions {
  const align = getArgFlag("align", args);
  if (align !== undefined && !isAlignment(align)) {
    throw new UsageError(`--align expects left, center or right, got "${align}"`);
  }
  const words = positionalArgs(args);
  return {
    text: words.length > 0 ? unescapeText(words.join(" ")) : undefined,
    font: getArgFlag("font", args),
    alignment: align,
    spacing: parseCount(getArgFlag("spacing", args), "spacing"),
    lineSpacing: parseCount(getArgFlag("line-spacing", args), "line-spacing"),
    config: getArgFlag("config", args),
  };
}

export function parseServeOptions(args: string[]): ServeOptions {
  return {
    port: getArgFlag("port", args),
    config: getArgFlag("config", args),
  };
}

export function parseConfigOptions(args: string[]): ConfigOptions {
  return {
    config: getConfigPath(args),
    expanded: hasFlag("expanded", args),
    force: hasFlag("force", args),
  };
}

export function parseFontsOptions(args: string[]): FontsOptions {
  return { config: getArgFlag("config", args) };
}
