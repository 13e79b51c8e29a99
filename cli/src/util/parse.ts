/**
 * Split a comma-separated list, dropping blanks.
 * Examples:
 *  - "rs, toml" => ["rs", "toml"]
 *  - "" => []
 */
export function splitCsv(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Parse a non-negative integer option such as --max-depth.
 * Throws an Error naming the option when the value is not one.
 */
export function parseNonNegativeInt(raw: string, optionName: string): number {
  const trimmed = String(raw).trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${optionName} '${raw}': expected a non-negative integer`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parse a positive integer option such as --capacity.
 */
export function parsePositiveInt(raw: string, optionName: string): number {
  const n = parseNonNegativeInt(raw, optionName);
  if (n < 1) {
    throw new Error(`Invalid ${optionName} '${raw}': expected a positive integer`);
  }
  return n;
}
