import { getDefaultFont } from "../fonts/registry";
import type { Font } from "../fonts/types";
import { assemble } from "./assemble";
import { RenderError, assertCount } from "./errors";
import type { Alignment } from "./types";

type BuilderState = {
  text?: string;
  font?: Font; // falls back to the bundled default font
  spacing?: number; // falls back to font.spacing
  lineSpacing: number;
  alignment: Alignment;
};

export type RenderResult = { ok: true; value: string } | { ok: false; error: RenderError };

const INITIAL_STATE: BuilderState = { lineSpacing: 0, alignment: "left" };

/**
 * Fluent render configuration. Every setter returns a new builder and
 * leaves the receiver untouched; `build()` renders.
 *
 * @example
 * const art = createBuilder().text("Hi").alignCenter().lineSpacing(1).build();
 */
export class BlockArtBuilder {
  private readonly state: BuilderState;
  private consumed = false;

  private constructor(state: BuilderState) {
    this.state = state;
  }

  static create(): BlockArtBuilder {
    return new BlockArtBuilder(INITIAL_STATE);
  }

  text(text: string): BlockArtBuilder {
    return this.with({ text });
  }

  font(font: Font): BlockArtBuilder {
    return this.with({ font });
  }

  spacing(spacing: number): BlockArtBuilder {
    return this.with({ spacing: assertCount(spacing, "spacing") });
  }

  lineSpacing(lineSpacing: number): BlockArtBuilder {
    return this.with({ lineSpacing: assertCount(lineSpacing, "lineSpacing") });
  }

  align(alignment: Alignment): BlockArtBuilder {
    return this.with({ alignment });
  }

  alignLeft(): BlockArtBuilder {
    return this.align("left");
  }

  alignCenter(): BlockArtBuilder {
    return this.align("center");
  }

  alignRight(): BlockArtBuilder {
    return this.align("right");
  }

  /**
   * Render the configured text.
   *
   * @throws RenderError with reason `MissingText` if `text()` was never called
   */
  build(): string {
    const { text, font, spacing, lineSpacing, alignment } = this.state;
    if (text === undefined) {
      throw new RenderError("MissingText", "No text to render; call text() before build()");
    }
    this.consumed = true;
    return assemble(font ?? getDefaultFont(), text, { alignment, lineSpacing, spacing });
  }

  tryBuild(): RenderResult {
    try {
      return { ok: true, value: this.build() };
    } catch (error) {
      if (error instanceof RenderError) return { ok: false, error };
      throw error;
    }
  }

  // A consumed builder hands out fresh configurations.
  private with(patch: Partial<BuilderState>): BlockArtBuilder {
    const base = this.consumed ? INITIAL_STATE : this.state;
    return new BlockArtBuilder({ ...base, ...patch });
  }
}

export function createBuilder(): BlockArtBuilder {
  return BlockArtBuilder.create();
}
