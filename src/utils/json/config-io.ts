import { readFile, writeFile } from "node:fs/promises";
import { ConfigError } from "../../config/validate";

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

/**
 * Read a configuration file from disk without expanding or validating it
 *
 * @param filePath - Path to the configuration file
 * @returns The parsed JSON object
 * @throws If the file cannot be read, is not JSON, or is not a JSON object
 */
export async function readConfigRaw(filePath: string): Promise<Record<string, unknown>> {
  const raw = await readFile(filePath, "utf8");
  const parsed = JSON.parse(raw) as unknown;
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Write a configuration to disk
 *
 * @param filePath - Path to write the configuration file
 * @param data - The configuration to write
 * @throws If the file cannot be written
 */
export async function writeConfigRaw(filePath: string, data: unknown): Promise<void> {
  const json = JSON.stringify(data, null, 2) + "\n";
  await writeFile(filePath, json, "utf8");
}
