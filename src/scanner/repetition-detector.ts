/**
 * Repetition detector.
 *
 * Flags passwords made of a short unit repeated two or more times, with at
 * most one stray character at each end: `abcabcabcabc`, `xyzxyz1`,
 * `!aaaaaaa?`. Units longer than MAX_CORE_LENGTH are not considered.
 */

/** Longest repeated unit the detector looks for. */
export const MAX_CORE_LENGTH = 8;

/** Minimum number of times the unit must appear. */
export const MIN_REPEATS = 2;

/** Characters allowed outside the repeated run, at each end. */
const MAX_EDGE_OFFSET = 1;

/**
 * True if the lowercase password is a short unit repeated at least twice,
 * optionally with one extra character before and/or after the run.
 */
export function isTrivialRepetition(password: string): boolean {
  const chars = Array.from(password.toLowerCase());

  for (let lead = 0; lead <= MAX_EDGE_OFFSET; lead++) {
    for (let trail = 0; trail <= MAX_EDGE_OFFSET; trail++) {
      const runLength = chars.length - lead - trail;
      for (let core = 1; core <= MAX_CORE_LENGTH; core++) {
        if (runLength < core * MIN_REPEATS || runLength % core !== 0) continue;
        if (isPeriodic(chars, lead, runLength, core)) return true;
      }
    }
  }

  return false;
}

/** Checks chars[start..start+length) has period `core`. */
function isPeriodic(chars: string[], start: number, length: number, core: number): boolean {
  for (let i = start; i < start + length - core; i++) {
    if (chars[i] !== chars[i + core]) return false;
  }
  return true;
}
