import { describe, expect, it } from "vitest";
import { HttpError } from "../../utils/http-error";
import { MAX_REQUEST_COUNT, MAX_REQUEST_TEXT_LENGTH, parseRenderBody, parseRenderQuery } from "./parse-request";

describe("parseRenderBody", () => {
  it("reads every field and accepts align as an alias", () => {
    expect(parseRenderBody({ text: "Hi", font: "mini", align: "center", spacing: 0, lineSpacing: 2 })).toEqual({
      text: "Hi",
      font: "mini",
      alignment: "center",
      spacing: 0,
      lineSpacing: 2,
    });
  });

  it("allows an empty text", () => {
    expect(parseRenderBody({ text: "" }).text).toBe("");
  });

  it("throws HttpError 400 for bad values", () => {
    expect(() => parseRenderBody("Hi")).toThrow(HttpError);
    expect(() => parseRenderBody({ text: "Hi", spacing: 1.5 })).toThrow("spacing must be a non-negative integer");
    expect(() => parseRenderBody({ text: "Hi", font: 3 })).toThrow("font must be a string");
  });

  it("caps counts and text length", () => {
    expect(parseRenderBody({ text: "Hi", spacing: MAX_REQUEST_COUNT }).spacing).toBe(256);
    expect(() => parseRenderBody({ text: "Hi", lineSpacing: 257 })).toThrow("lineSpacing must be at most 256");
    expect(() => parseRenderBody({ text: "x".repeat(MAX_REQUEST_TEXT_LENGTH + 1) })).toThrow(
      "text must be at most 1024 characters"
    );
  });
});

describe("parseRenderQuery", () => {
  it("parses counts from strings", () => {
    expect(parseRenderQuery({ text: "x", spacing: "3", lineSpacing: "" })).toEqual({
      text: "x",
      font: undefined,
      alignment: undefined,
      spacing: 3,
      lineSpacing: undefined,
    });
  });

  it("rejects non-numeric counts", () => {
    expect(() => parseRenderQuery({ text: "x", lineSpacing: "2px" })).toThrow(
      "lineSpacing must be a non-negative integer"
    );
  });

  it("caps counts before rendering", () => {
    expect(() => parseRenderQuery({ text: "x", spacing: "900000000" })).toThrow(HttpError);
    expect(() => parseRenderQuery({ text: "x", lineSpacing: "60000000" })).toThrow(
      "lineSpacing must be at most 256"
    );
  });
});
