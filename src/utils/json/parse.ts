/**
 * Interpret a command-line value: JSON literals (numbers, booleans, null,
 * quoted strings, arrays, objects) are parsed, anything else stays a string.
 *
 * @example
 * parseValueLiteral("2") // 2
 * parseValueLiteral("true") // true
 * parseValueLiteral("center") // "center"
 */
export function parseValueLiteral(value: string): unknown {
  const trimmed = value.trim();
  if (trimmed === "") return value;
  try {
    return JSON.parse(trimmed) as unknown;
  } catch {
    return value;
  }
}
