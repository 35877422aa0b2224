import { cmdRender } from "./commands/render";
import { cmdFontsCheck, cmdFontsExport, cmdFontsList } from "./commands/fonts";
import { cmdServe } from "./commands/serve";
import { cmdConfigInit } from "./commands/config/init";
import { cmdConfigShow } from "./commands/config/show";
import { cmdConfigGet } from "./commands/config/get";
import { cmdConfigSet } from "./commands/config/set";
import { positionalArgs } from "./commands/utils";
import { parseConfigOptions, parseFontsOptions, parseRenderOptions, parseServeOptions } from "./parse-options";
import { UsageError, exitWithError } from "./utils/errors";

export function usage(): string {
  return `
blockart CLI

Usage:
  blockart render <text...> [--font <name|path>] [--align left|center|right]
                            [--spacing <n>] [--line-spacing <n>] [--config <path>]
  blockart fonts list [--config <path>]
  blockart fonts check <path>
  blockart fonts export <name> <path> [--config <path>]
  blockart serve [--port <number>] [--config <path>]
  blockart config init [--config ./blockart.config.json] [--force]
  blockart config show [--config ./blockart.config.json] [--expanded]
  blockart config get <path> [--config ./blockart.config.json]
  blockart config set <path> <value> [--config ./blockart.config.json]

Options:
  --font <name|path>    Bundled font (default, ansi-compact, mini), a font named in the config, or a font JSON file
  --align <alignment>   Horizontal alignment of multiple lines (default: left)
  --spacing <n>         Blank columns between characters (default: the font's spacing)
  --line-spacing <n>    Blank rows between lines of text (default: 0)
  --port <number>       Port to listen on (default: 8090)
  --config <path>       Path to blockart config JSON (auto-detected if omitted)

Examples:
  blockart render Hello
  blockart render "Hello\\nWorld" --align center --line-spacing 1
  echo hi | blockart render --font mini
  blockart fonts export mini ./mini.json
  blockart serve --port 9000
  blockart config set defaults.font ansi-compact
`;
}

async function dispatch(argv: string[]): Promise<void> {
  const [, , cmd, ...rest] = argv;
  switch (cmd) {
    case "render":
      await cmdRender(parseRenderOptions(rest));
      return;
    case "fonts": {
      const [subcmd, ...args] = rest;
      const [first, second] = positionalArgs(args);
      switch (subcmd) {
        case "list":
          await cmdFontsList(parseFontsOptions(args));
          return;
        case "check":
          await cmdFontsCheck(first);
          return;
        case "export":
          await cmdFontsExport(first, second, parseFontsOptions(args));
          return;
        default:
          throw new UsageError(usage());
      }
    }
    case "serve":
      await cmdServe(parseServeOptions(rest));
      return;
    case "config": {
      const [subcmd, ...args] = rest;
      const configOptions = parseConfigOptions(args);
      const [first, second] = positionalArgs(args);
      switch (subcmd) {
        case "init":
          await cmdConfigInit(configOptions);
          return;
        case "show":
          await cmdConfigShow(configOptions);
          return;
        case "get":
          await cmdConfigGet(first, configOptions);
          return;
        case "set":
          await cmdConfigSet(first, second, configOptions);
          return;
        default:
          throw new UsageError(usage());
      }
    }
    case undefined:
    case "help":
    case "--help":
      console.log(usage());
      return;
    default:
      throw new UsageError(usage());
  }
}

export async function runCli(argv: string[]): Promise<void> {
  try {
    await dispatch(argv);
  } catch (error) {
    if (error instanceof UsageError) exitWithError(error.message);
    throw error;
  }
}
