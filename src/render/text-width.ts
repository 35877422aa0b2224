// Column helpers. One code point counts as one column.

export function displayWidth(text: string): number {
  let n = 0;
  for (const _ of text) n++;
  return n;
}

export function padColumnsEnd(text: string, columns: number): string {
  const deficit = columns - displayWidth(text);
  return deficit > 0 ? text + " ".repeat(deficit) : text;
}

export function padColumnsStart(text: string, columns: number): string {
  const deficit = columns - displayWidth(text);
  return deficit > 0 ? " ".repeat(deficit) + text : text;
}

/**
 * Split text into lines on \r\n, \n or \r. A single trailing line break
 * does not produce an extra empty line; "" is one empty line.
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\n|\r/);
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}
