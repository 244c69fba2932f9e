/**
 * Supported ESP chips and the target-list parser.
 */

import { TargetParseError } from "../errors";

/**
 * Supported chips in canonical order.
 */
export const CHIPS = ["esp32", "esp32s2", "esp32s3", "esp32c3"] as const;

export type Chip = (typeof CHIPS)[number];

const ALL_TARGETS = "all";

export function isChip(value: string): value is Chip {
  return CHIPS.some((chip) => chip === value);
}

/**
 * Parse a user-supplied target list such as `"esp32,esp32c3"` or `"all"`.
 *
 * Tokens are separated by commas and/or whitespace and compared
 * case-insensitively. If any token is `all`, the full canonical set is
 * returned and the other tokens are not looked at, even unknown ones.
 * Otherwise every token must name a chip; the result keeps input order
 * without duplicates.
 *
 * @throws TargetParseError UNKNOWN_TARGET naming the first unrecognised token
 * @throws TargetParseError EMPTY_TARGETS when the input has no tokens
 *
 * @example
 * parseTargets("esp32, esp32c3"); // ["esp32", "esp32c3"]
 * parseTargets("esp32 all");      // ["esp32", "esp32s2", "esp32s3", "esp32c3"]
 */
export function parseTargets(input: string): readonly Chip[] {
  const tokens = input
    .trim()
    .toLowerCase()
    .split(/[\s,]+/)
    .filter((token) => token.length > 0);

  if (tokens.length === 0) {
    throw new TargetParseError("No targets specified", "EMPTY_TARGETS", "");
  }
  if (tokens.includes(ALL_TARGETS)) {
    return [...CHIPS];
  }

  const chips: Chip[] = [];
  for (const token of tokens) {
    if (!isChip(token)) {
      throw new TargetParseError(`Unknown target: ${token}`, "UNKNOWN_TARGET", token);
    }
    if (!chips.includes(token)) {
      chips.push(token);
    }
  }
  return chips;
}
