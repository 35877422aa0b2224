export type Alignment = "left" | "center" | "right";

export const ALIGNMENTS: readonly Alignment[] = ["left", "center", "right"];

export function isAlignment(value: unknown): value is Alignment {
  return typeof value === "string" && ALIGNMENTS.some((a) => a === value);
}

// One rendered input line before vertical assembly
export type ComposedBlock = {
  rows: string[]; // `font.height` rows, all `width` columns wide
  width: number;
};

export type AssembleOptions = {
  alignment?: Alignment; // default "left"
  lineSpacing?: number; // blank rows between rendered lines, default 0
  spacing?: number; // overrides font.spacing
};
