import {
  assertWellFormed,
  isEquivalent,
  isNormalized,
  normalize,
  toHexCodePoints
} from '../normalizer/normalizer.js';
import type { CharacterInfo, ComparisonReport } from './types.js';

/**
 * Describes each code point of `text` and whether it is stable under NFC and NFKC
 * @throws InvalidInputError if the text contains an unpaired surrogate
 */
export function inspectCharacters(text: string): CharacterInfo[] {
  assertWellFormed(text);

  return Array.from(text, (character) => {
    const codePoint = character.codePointAt(0) ?? 0;
    return {
      character,
      codePoint,
      hex: toHexCodePoints(character),
      isNfc: isNormalized(character, 'NFC'),
      isNfkc: isNormalized(character, 'NFKC')
    };
  });
}

/**
 * Builds the report shown by `compare`
 * @throws InvalidInputError if either string contains an unpaired surrogate
 */
export function compareStrings(first: string, second: string): ComparisonReport {
  const normalizedFirst = normalize(first);
  const normalizedSecond = normalize(second);

  return {
    first,
    second,
    firstCharacters: inspectCharacters(first),
    secondCharacters: inspectCharacters(second),
    normalizedFirst,
    normalizedSecond,
    normalizedFirstHex: toHexCodePoints(normalizedFirst),
    normalizedSecondHex: toHexCodePoints(normalizedSecond),
    equivalent: isEquivalent(first, second)
  };
}
