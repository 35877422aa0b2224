// CLI command options types

import type { Alignment } from "../../render/types";

export interface RenderOptions {
  text?: string; // read from stdin when absent
  font?: string; // bundled name, configured name, or path to a font JSON
  alignment?: Alignment;
  spacing?: number;
  lineSpacing?: number;
  config?: string;
}

export interface ServeOptions {
  port?: string | number;
  config?: string;
}

export interface ConfigOptions {
  config: string; // Always resolved to a path
  expanded?: boolean;
  force?: boolean;
}

export interface FontsOptions {
  config?: string;
}
