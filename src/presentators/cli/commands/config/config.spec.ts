import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { parseConfig } from "../../../../config/validate";
import type { ConfigOptions } from "../../types";
import { UsageError } from "../../utils/errors";
import { cmdConfigGet } from "./get";
import { cmdConfigInit, defaultConfig } from "./init";
import { cmdConfigSet } from "./set";
import { cmdConfigShow } from "./show";

describe("config commands", () => {
  let dir: string;
  let options: ConfigOptions;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "blockart-config-cli-"));
    options = { config: path.join(dir, "blockart.config.json") };
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("writes a valid default config", async () => {
    await cmdConfigInit(options);
    const written: unknown = JSON.parse(await readFile(options.config, "utf8"));
    expect(written).toEqual(defaultConfig());
    expect(parseConfig(written)).toEqual(defaultConfig());
  });

  it("refuses to overwrite without --force", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    await cmdConfigInit(options);
    await expect(cmdConfigInit(options)).rejects.toThrow("exit 1");
    expect(error).toHaveBeenCalledWith(`Config already exists: ${options.config} (use --force to overwrite)`);
    await cmdConfigInit({ ...options, force: true });
  });

  it("sets and reads values by path", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    await cmdConfigInit(options);
    await cmdConfigSet("defaults.spacing", "2", options);
    await cmdConfigSet("fonts.shadow", "./shadow.json", options);
    await cmdConfigGet("defaults.spacing", options);
    expect(log).toHaveBeenLastCalledWith("2");
    await cmdConfigGet("fonts", options);
    expect(log).toHaveBeenLastCalledWith(JSON.stringify({ shadow: "./shadow.json" }, null, 2));
  });

  it("refuses values that would make the config invalid", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    await cmdConfigInit(options);
    await expect(cmdConfigSet("defaults.alignment", "middle", options)).rejects.toThrow("exit 1");
    expect(error).toHaveBeenCalledWith(
      'Refusing to write invalid config: defaults.alignment must be "left", "center" or "right"'
    );
    const stored: unknown = JSON.parse(await readFile(options.config, "utf8"));
    expect(stored).toEqual(defaultConfig());
  });

  it("rejects keys outside the known sections", async () => {
    await cmdConfigInit(options);
    await expect(cmdConfigSet("defualts.font", "mini", options)).rejects.toThrow(UsageError);
    await expect(cmdConfigGet("theme", options)).rejects.toThrow(
      'Unknown config key "theme". Top-level keys: defaults, fonts, server, logging'
    );
  });

  it("reports unset values", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    await cmdConfigInit(options);
    await expect(cmdConfigGet("defaults.spacing", options)).rejects.toThrow("exit 1");
    expect(error).toHaveBeenCalledWith(`defaults.spacing is not set in ${options.config}`);
  });

  it("points at config init when the file is missing", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    await expect(cmdConfigShow(options)).rejects.toThrow("exit 1");
    expect(error).toHaveBeenCalledWith(
      `No config file at ${options.config}. Run "blockart config init" to create one.`
    );
  });

  it("shows the effective config with variables expanded and unknown keys dropped", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const raw = { defaults: { font: "${BLOCKART_TEST_SHOW_FONT:-mini}" }, extra: true };
    await writeFile(options.config, JSON.stringify(raw), "utf8");
    await cmdConfigShow(options);
    expect(log).toHaveBeenLastCalledWith(JSON.stringify(raw, null, 2));
    await cmdConfigShow({ ...options, expanded: true });
    expect(log).toHaveBeenLastCalledWith(JSON.stringify({ defaults: { font: "mini" } }, null, 2));
  });

  it("refuses to show an invalid config", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    await writeFile(options.config, JSON.stringify({ server: { port: 0 } }), "utf8");
    await expect(cmdConfigShow(options)).rejects.toThrow("exit 1");
    expect(error).toHaveBeenCalledWith(
      `Invalid config ${options.config}: server.port must be a TCP port number`
    );
  });
});
