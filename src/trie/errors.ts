/**
 * errors.ts - Validation errors raised by the trie and its callers
 *
 * Absence is never an error: lookups return false/null and pattern
 * traversal yields nothing. Only input outside the alphabet throws.
 */

/**
 * Base for alphabet violations. Records the rejected input, the first
 * offending character and its index within the input.
 */
export abstract class AlphabetError extends Error {
  constructor(
    message: string,
    readonly input: string,
    readonly character: string,
    readonly position: number
  ) {
    super(message);
  }
}

/** A word contains a character outside A-Z. */
export class InvalidCharacterError extends AlphabetError {
  override readonly name = 'InvalidCharacterError';

  constructor(input: string, character: string, position: number) {
    super(
      `Invalid character ${JSON.stringify(character)} at position ${position} in ${JSON.stringify(input)}: words must be capitalized A-Z only`,
      input,
      character,
      position
    );
  }
}

/** A pattern contains a character outside A-Z and '.'. */
export class InvalidPatternError extends AlphabetError {
  override readonly name = 'InvalidPatternError';

  constructor(input: string, character: string, position: number) {
    super(
      `Invalid character ${JSON.stringify(character)} at position ${position} in pattern ${JSON.stringify(input)}: patterns must be capitalized A-Z and . only`,
      input,
      character,
      position
    );
  }
}
