import { loadConfigOnce, resolveConfigPath } from "../../../config";
import { createRenderApp } from "../../http/app";
import { startHonoServer } from "../../http/server";
import type { ServeOptions } from "../types";

export async function cmdServe(options: ServeOptions): Promise<void> {
  const configPath = options.config ?? resolveConfigPath();
  const config = await loadConfigOnce(configPath);
  const app = createRenderApp({ config });

  startHonoServer(app, {
    port: options.port,
    configPort: config.server?.port,
    configPath,
  });
}
