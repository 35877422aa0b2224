function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

/**
 * Get a value from an object using a dot-notation path
 *
 * @param obj - The object to get the value from
 * @param dotPath - Dot-notation path (e.g., "defaults.alignment")
 * @returns The value at the specified path, or undefined if not found
 *
 * @example
 * const config = { defaults: { alignment: "center" } };
 * getByPath(config, "defaults.alignment") // returns "center"
 * getByPath(config, "nonexistent.path") // returns undefined
 */
export function getByPath(obj: object, dotPath: string): unknown {
  return dotPath.split(".").reduce<unknown>((acc, key) => {
    if (!isRecord(acc)) {
      return undefined;
    }
    return acc[key];
  }, obj);
}

/**
 * Set a value in an object using a dot-notation path
 * Creates intermediate objects as needed
 *
 * @example
 * const config = {};
 * setByPath(config, "fonts.banner", "./fonts/banner.json");
 * // config is now { fonts: { banner: "./fonts/banner.json" } }
 */
export function setByPath(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const parts = dotPath.split(".");
  let cur = obj;
  for (let i = 0; i < parts.length - 1; i++) {
    const k = parts[i];
    const next = cur[k];
    if (isRecord(next)) {
      cur = next;
    } else {
      const created: Record<string, unknown> = {};
      cur[k] = created;
      cur = created;
    }
  }
  cur[parts[parts.length - 1]] = value;
}
