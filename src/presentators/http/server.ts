import { serve } from "@hono/node-server";
import type { Hono } from "hono";
import { printStartupInfo } from "./utils/startup-info";

export const DEFAULT_PORT = 8090;

export function resolvePort(portFromArg?: string | number, configPort?: number): number {
  if (typeof portFromArg === "number") return portFromArg;
  if (typeof portFromArg === "string" && portFromArg.trim()) {
    const n = parseInt(portFromArg, 10);
    if (!Number.isNaN(n)) return n;
  }
  if (process.env.PORT) {
    const env = parseInt(process.env.PORT, 10);
    if (!Number.isNaN(env)) return env;
  }
  return configPort ?? DEFAULT_PORT;
}

export type ServerOptions = {
  port?: number | string;
  configPort?: number;
  configPath?: string;
};

/**
 * Starts a Node server for the Hono app and prints where it listens
 */
export function startHonoServer(app: Hono, opts: ServerOptions = {}): void {
  const port = resolvePort(opts.port, opts.configPort);
  serve({ fetch: app.fetch, port }, (info) => {
    printStartupInfo(info.port, app, opts.configPath);
  });
}
