import { parseConfig } from "../../../../config/validate";
import { readConfigRaw, writeConfigRaw } from "../../../../utils/json/config-io";
import { parseValueLiteral } from "../../../../utils/json/parse";
import { setByPath } from "../../../../utils/path/object-path";
import type { ConfigOptions } from "../../types";
import { describeError, exitWithError, requireArgument, requireConfigFile } from "../../utils/errors";
import { checkConfigKey } from "../utils";

export async function cmdConfigSet(
  pathArg: string | undefined,
  valueArg: string | undefined,
  options: ConfigOptions
): Promise<void> {
  requireArgument(pathArg, "Usage: blockart config set <path> <value>");
  requireArgument(valueArg, "Usage: blockart config set <path> <value>");
  checkConfigKey(pathArg);
  const filePath = options.config;
  requireConfigFile(filePath);
  const raw = await readConfigRaw(filePath);
  setByPath(raw, pathArg, parseValueLiteral(valueArg));
  try {
    parseConfig(raw);
  } catch (error) {
    exitWithError(`Refusing to write invalid config: ${describeError(error)}`);
  }
  await writeConfigRaw(filePath, raw);
  console.log(`Updated ${pathArg} in ${filePath}`);
}
