import { expandConfig } from "../../../../config/expansion";
import { readConfigRaw } from "../../../../utils/json/config-io";
import { getByPath } from "../../../../utils/path/object-path";
import type { ConfigOptions } from "../../types";
import { describeError, exitWithError, requireArgument, requireConfigFile } from "../../utils/errors";
import { checkConfigKey } from "../utils";

export async function cmdConfigGet(pathArg: string | undefined, options: ConfigOptions): Promise<void> {
  requireArgument(pathArg, "Missing <path>. Example: blockart config get defaults.font");
  checkConfigKey(pathArg);
  const filePath = options.config;
  requireConfigFile(filePath);

  let source: unknown = await readConfigRaw(filePath);
  if (options.expanded) {
    try {
      source = expandConfig(source);
    } catch (error) {
      exitWithError(`Cannot expand ${filePath}: ${describeError(error)}`);
    }
  }

  const value = typeof source === "object" && source !== null ? getByPath(source, pathArg) : undefined;
  if (value === undefined) {
    exitWithError(`${pathArg} is not set in ${filePath}`);
  }
  console.log(JSON.stringify(value, null, 2));
}
