/**
 * Display-name derivation for argument and command identifiers.
 *
 * @packageDocumentation
 */

const ALPHANUMERIC = /^[\p{L}\p{N}]$/u;
const NUMERIC = /^\p{N}$/u;

function isAlphanumeric(character: string): boolean {
  return ALPHANUMERIC.test(character);
}

function isUppercase(character: string): boolean {
  return character !== character.toLowerCase() && character === character.toUpperCase();
}

function isLowercase(character: string): boolean {
  return character !== character.toUpperCase() && character === character.toLowerCase();
}

/**
 * Converts an identifier into a sentence-cased label.
 *
 * Words are split on runs of non-alphanumeric characters, after digits and on
 * lower-to-upper camel-case boundaries. The first letter of the result is
 * upper-cased and every other letter lower-cased.
 *
 * @param identifier - Identifier such as `required_field` or `countOccurrences`.
 * @returns The label, e.g. `Required field` or `Count occurrences`.
 *
 * @example
 * ```typescript
 * toSentenceCase('field_with_default'); // "Field with default"
 * toSentenceCase('nativePathPicker');   // "Native path picker"
 * ```
 */
export function toSentenceCase(identifier: string): string {
  const characters = Array.from(identifier);
  let end = characters.length;
  while (end > 0) {
    const last = characters[end - 1];
    if (last !== undefined && isAlphanumeric(last)) {
      break;
    }
    end--;
  }

  let result = '';
  let newWord = true;
  let firstWord = true;
  let foundRealChar = false;
  // Only updated on plain continuation characters.
  let lastChar = ' ';

  for (const character of characters.slice(0, end)) {
    const alphanumeric = isAlphanumeric(character);

    if (!alphanumeric && foundRealChar) {
      newWord = true;
    } else if (!alphanumeric) {
      continue;
    } else if (NUMERIC.test(character)) {
      foundRealChar = true;
      newWord = true;
      result += character;
    } else if (newWord || (isLowercase(lastChar) && isUppercase(character))) {
      foundRealChar = true;
      newWord = false;
      if (firstWord) {
        result += character.toUpperCase();
        firstWord = false;
      } else {
        result += ' ' + character.toLowerCase();
      }
    } else {
      foundRealChar = true;
      lastChar = character;
      result += character.toLowerCase();
    }
  }

  return result;
}
