import type { Hono } from "hono";
import { logInfo } from "../../../utils/logging/log-helpers";

export function extractEndpoints(app: Hono): string[] {
  const endpoints = app.routes
    .filter((r) => r.method !== "ALL")
    .map((r) => `${r.method} ${r.path}`);
  return Array.from(new Set(endpoints)).sort();
}

export function printStartupInfo(port: number, app: Hono, configPath?: string): void {
  const lines = [
    `Server is running: http://localhost:${port}`,
    `Config file: ${configPath ?? "(none, using defaults)"}`,
    "Endpoints:",
    ...extractEndpoints(app).map((ep) => `   - ${ep}`),
  ];
  console.log(lines.join("\n"));
  logInfo(`Listening on port ${port}`);
}
