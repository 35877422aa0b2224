import type { Font } from "../fonts/types";
import { composeLine } from "./compose";
import { assertCount } from "./errors";
import { splitLines } from "./text-width";
import type { Alignment, AssembleOptions, ComposedBlock } from "./types";

export function alignRow(row: string, rowWidth: number, maxWidth: number, alignment: Alignment): string {
  const deficit = Math.max(0, maxWidth - rowWidth);
  switch (alignment) {
    case "left":
      return row + " ".repeat(deficit);
    case "right":
      return " ".repeat(deficit) + row;
    case "center": {
      const lead = Math.floor(deficit / 2);
      return " ".repeat(lead) + row + " ".repeat(deficit - lead);
    }
  }
}

/**
 * Render multi-line text: compose each line, align the blocks to the widest
 * one and stack them with `lineSpacing` blank rows in between.
 *
 * @throws RenderError with reason `InvalidOption` for a negative or fractional count
 */
export function assemble(font: Font, text: string | readonly string[], options: AssembleOptions = {}): string {
  const alignment = options.alignment ?? "left";
  const lineSpacing = assertCount(options.lineSpacing ?? 0, "lineSpacing");
  const spacing = options.spacing === undefined ? undefined : assertCount(options.spacing, "spacing");
  const lines = typeof text === "string" ? splitLines(text) : text;

  const blocks: ComposedBlock[] = lines.map((line) => composeLine(font, line, spacing));
  const maxWidth = blocks.reduce((max, block) => Math.max(max, block.width), 0);
  const separator = " ".repeat(maxWidth);

  const out: string[] = [];
  blocks.forEach((block, idx) => {
    if (idx > 0) {
      for (let i = 0; i < lineSpacing; i++) out.push(separator);
    }
    for (const row of block.rows) {
      out.push(alignRow(row, block.width, maxWidth, alignment));
    }
  });
  return out.join("\n");
}
