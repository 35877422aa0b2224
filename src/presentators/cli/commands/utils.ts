import path from "node:path";
import { resolveConfigPath } from "../../../config/paths";
import { CONFIG_SECTIONS, isConfigSection } from "../../../config/validate";
import { UsageError } from "../utils/errors";

// Flags that consume the following argument as their value
export const VALUE_FLAGS = ["font", "align", "spacing", "line-spacing", "config", "port"];

export function getArgFlag(name: string, args: string[] = process.argv): string | undefined {
  const flag = `--${name}`;
  const idx = args.indexOf(flag);
  if (idx >= 0 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

export function hasFlag(name: string, args: string[] = process.argv): boolean {
  return args.includes(`--${name}`);
}

/**
 * Arguments that are neither flags nor flag values
 */
export function positionalArgs(args: string[], valueFlags: string[] = VALUE_FLAGS): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--") && arg.length > 2) {
      if (valueFlags.includes(arg.slice(2))) i++;
      continue;
    }
    out.push(arg);
  }
  return out;
}

export function getConfigPath(args: string[] = process.argv): string {
  const cfgArg = getArgFlag("config", args);
  if (cfgArg) return path.resolve(cfgArg);
  return resolveConfigPath();
}

/**
 * Reject dot paths outside the known config sections, e.g. "defualts.font"
 */
export function checkConfigKey(dotPath: string): void {
  const [section] = dotPath.split(".");
  if (!isConfigSection(section)) {
    throw new UsageError(`Unknown config key "${dotPath}". Top-level keys: ${CONFIG_SECTIONS.join(", ")}`);
  }
}
