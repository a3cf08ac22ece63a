/**
 * Durations as written on the command line and in the config file:
 * a sequence of `<number><unit>` with units ms, s, m, h (e.g. `1m30s`,
 * `250ms`, `1.5s`). A bare `0` is accepted.
 */

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const PART_RE = /(\d+(?:\.\d+)?)(ms|s|m|h)/y;

/** Milliseconds for `text`, or null if it is not a duration */
export function parseDuration(text: string): number | null {
  const input = text.trim();
  if (input === "0") return 0;
  if (input === "") return null;

  let total = 0;
  PART_RE.lastIndex = 0;
  while (PART_RE.lastIndex < input.length) {
    const match = PART_RE.exec(input);
    if (!match) return null;
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
  }
  return Math.round(total);
}
