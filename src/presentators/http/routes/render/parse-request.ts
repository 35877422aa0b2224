import { isAlignment } from "../../../../render/types";
import type { RenderRequest } from "../../../../render/request";
import { badRequest } from "../../utils/http-error";

// Upper bounds for values taken from requests
export const MAX_REQUEST_COUNT = 256;
export const MAX_REQUEST_TEXT_LENGTH = 1024;

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

function readCount(value: unknown, name: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw badRequest(`${name} must be a non-negative integer`);
  }
  return checkLimit(value, name);
}

function checkLimit(value: number, name: string): number {
  if (value > MAX_REQUEST_COUNT) throw badRequest(`${name} must be at most ${MAX_REQUEST_COUNT}`);
  return value;
}

function parseCountParam(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value === "") return undefined;
  if (!/^\d+$/.test(value)) throw badRequest(`${name} must be a non-negative integer`);
  return checkLimit(parseInt(value, 10), name);
}

function readAlignment(value: unknown): RenderRequest["alignment"] {
  if (value === undefined || value === "") return undefined;
  if (!isAlignment(value)) throw badRequest(`alignment must be "left", "center" or "right"`);
  return value;
}

function readText(value: unknown): string {
  if (typeof value !== "string") throw badRequest("text is required and must be a string");
  if (value.length > MAX_REQUEST_TEXT_LENGTH) {
    throw badRequest(`text must be at most ${MAX_REQUEST_TEXT_LENGTH} characters`);
  }
  return value;
}

function readFontName(value: unknown): string | undefined {
  if (value === undefined || value === "") return undefined;
  if (typeof value !== "string") throw badRequest("font must be a string");
  return value;
}

/**
 * Validate a JSON body for POST /render
 */
export function parseRenderBody(body: unknown): RenderRequest {
  if (!isRecord(body)) throw badRequest("Request body must be a JSON object");
  return {
    text: readText(body.text),
    font: readFontName(body.font),
    alignment: readAlignment(body.alignment ?? body.align),
    spacing: readCount(body.spacing, "spacing"),
    lineSpacing: readCount(body.lineSpacing, "lineSpacing"),
  };
}

/**
 * Validate query parameters for GET /render
 */
export function parseRenderQuery(query: Record<string, string>): RenderRequest {
  return {
    text: readText(query.text),
    font: readFontName(query.font),
    alignment: readAlignment(query.alignment ?? query.align),
    spacing: parseCountParam(query.spacing, "spacing"),
    lineSpacing: parseCountParam(query.lineSpacing, "lineSpacing"),
  };
}
