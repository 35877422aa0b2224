import { loadConfigOnce } from "../../../config";
import type { BlockArtConfig } from "../../../config/types";
import { createFontResolver } from "../../../fonts/resolve";
import { renderRequest } from "../../../render/request";
import { tryWithFallback } from "../../../utils/error-handling/try-catch";
import { logWarn } from "../../../utils/logging/log-helpers";
import type { RenderOptions } from "../types";
import { describeError, exitWithError, formatFontError } from "../utils/errors";

export type InputStream = NodeJS.ReadableStream & { isTTY?: boolean };

export async function readStdin(stream: InputStream = process.stdin): Promise<string | undefined> {
  if (stream.isTTY) return undefined;
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

export async function loadCliConfig(configPath?: string): Promise<BlockArtConfig> {
  return tryWithFallback<BlockArtConfig>(
    () => loadConfigOnce(configPath),
    {},
    (error) => logWarn("Ignoring unusable config file", describeError(error), { command: "config" })
  );
}

export async function cmdRender(
  options: RenderOptions,
  readInput: () => Promise<string | undefined> = readStdin
): Promise<void> {
  const config = await loadCliConfig(options.config);
  const text = options.text ?? (await readInput());
  if (text === undefined || text === "") {
    exitWithError("Nothing to render. Pass text as arguments or pipe it on stdin.");
  }

  const resolver = createFontResolver(config, { allowPaths: true });
  const result = await resolver.resolve(options.font);
  if (!result.ok) {
    exitWithError(formatFontError(result.error));
  }

  console.log(renderRequest(result.font, { ...options, text }, config.defaults));
}
