import type { BlockArtConfig } from "../../../../config/types";
import { writeConfigRaw } from "../../../../utils/json/config-io";
import type { ConfigOptions } from "../../types";
import { refuseOverwrite } from "../../utils/errors";

export function defaultConfig(): BlockArtConfig {
  return {
    defaults: { font: "default", alignment: "left", lineSpacing: 0 },
    fonts: {},
    server: { port: 8090 },
    logging: { enabled: true, level: "warn" },
  };
}

export async function cmdConfigInit(options: ConfigOptions): Promise<void> {
  const filePath = options.config;
  refuseOverwrite(filePath, options.force);
  await writeConfigRaw(filePath, defaultConfig());
  console.log(`Initialized config at ${filePath}`);
}
