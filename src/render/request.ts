import type { RenderDefaults } from "../config/types";
import type { Font } from "../fonts/types";
import { createBuilder } from "./builder";
import type { Alignment } from "./types";

// Render parameters as they arrive from the CLI or HTTP, before font resolution
export type RenderRequest = {
  text: string;
  font?: string;
  alignment?: Alignment;
  spacing?: number;
  lineSpacing?: number;
};

/**
 * Render a request with an already resolved font. Request values win over
 * configured defaults; anything unset falls back to the builder's defaults.
 */
export function renderRequest(font: Font, req: RenderRequest, defaults: RenderDefaults = {}): string {
  let builder = createBuilder()
    .text(req.text)
    .font(font)
    .align(req.alignment ?? defaults.alignment ?? "left")
    .lineSpacing(req.lineSpacing ?? defaults.lineSpacing ?? 0);
  const spacing = req.spacing ?? defaults.spacing;
  if (spacing !== undefined) builder = builder.spacing(spacing);
  return builder.build();
}
