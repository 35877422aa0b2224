import { describe, expect, it } from "vitest";
import { expandConfig, expandValue } from "./expansion";

const env = { BLOCKART_FONT: "mini", EMPTY: "" };

describe("expandValue", () => {
  it("substitutes set variables", () => {
    expect(expandValue("${BLOCKART_FONT}", env)).toBe("mini");
    expect(expandValue("fonts/${BLOCKART_FONT}.json", env)).toBe("fonts/mini.json");
  });

  it("leaves unset variables untouched", () => {
    expect(expandValue("${MISSING}", env)).toBe("${MISSING}");
  });

  it("uses the default for unset or empty variables", () => {
    expect(expandValue("${MISSING:-default}", env)).toBe("default");
    expect(expandValue("${EMPTY:-default}", env)).toBe("default");
  });

  it("throws the given message for required variables", () => {
    expect(() => expandValue("${MISSING:?font dir required}", env)).toThrow("font dir required");
    expect(() => expandValue("${MISSING:?}", env)).toThrow("Environment variable MISSING is not set");
  });
});

describe("expandConfig", () => {
  it("expands strings at any depth and keeps other values", () => {
    const input = { defaults: { font: "${BLOCKART_FONT}", spacing: 1 }, list: ["${EMPTY:-x}", true, null] };
    expect(expandConfig(input, env)).toEqual({ defaults: { font: "mini", spacing: 1 }, list: ["x", true, null] });
  });
});
