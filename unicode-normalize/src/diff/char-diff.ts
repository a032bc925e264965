import type { CharDifference } from '../normalizer/types.js';

/**
 * Compares two strings position by position and reports every index where
 * their code units differ.
 *
 * This is a positional walk, not an alignment: an inserted or removed
 * character shows up as a run of mismatches after it. Only indexes below the
 * shorter length are compared, so characters trailing off the end of the
 * longer string are never reported.
 *
 * @param original - String as read
 * @param normalized - Its normalized form
 * @returns Differences in ascending position order
 *
 * @example
 * diff('cafe\u0301', 'caf\u00e9')
 * // Returns: [{ position: 3, original: 'e', normalized: '\u00e9' }]
 */
export function diff(original: string, normalized: string): CharDifference[] {
  const differences: CharDifference[] = [];
  const length = Math.min(original.length, normalized.length);

  for (let position = 0; position < length; position++) {
    const originalUnit = original.charAt(position);
    const normalizedUnit = normalized.charAt(position);

    if (originalUnit !== normalizedUnit) {
      differences.push({
        position,
        original: originalUnit,
        normalized: normalizedUnit
      });
    }
  }

  return differences;
}
