import { expandConfig } from "../../../../config/expansion";
import type { BlockArtConfig } from "../../../../config/types";
import { parseConfig } from "../../../../config/validate";
import { readConfigRaw } from "../../../../utils/json/config-io";
import type { ConfigOptions } from "../../types";
import { describeError, exitWithError, requireConfigFile } from "../../utils/errors";

/**
 * Print the config file. With --expanded, print what blockart actually
 * uses: variables substituted and unknown keys dropped.
 */
export async function cmdConfigShow(options: ConfigOptions): Promise<void> {
  const filePath = options.config;
  requireConfigFile(filePath);
  const raw = await readConfigRaw(filePath);

  let effective: BlockArtConfig;
  try {
    effective = parseConfig(expandConfig(raw));
  } catch (error) {
    exitWithError(`Invalid config ${filePath}: ${describeError(error)}`);
  }

  console.log(JSON.stringify(options.expanded ? effective : raw, null, 2));
}
