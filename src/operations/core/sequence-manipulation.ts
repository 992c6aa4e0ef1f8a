/**
 * Core sequence manipulation operations
 *
 * Watson-Crick complement and reverse complement over A, T, G, C. Anything
 * else is reported as an InvalidBaseError on the left side of an Either.
 *
 * @module sequence-manipulation
 */

import { Either } from "effect";
import { InvalidBaseError } from "../../errors";

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * DNA complement mapping, canonical bases only
 */
const DNA_COMPLEMENT_MAP: Readonly<Record<string, string>> = {
  A: "T",
  T: "A",
  G: "C",
  C: "G",
};

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Complement each base without reversing
 *
 * @example
 * ```typescript
 * Either.getOrThrow(complement('ATGC')); // 'TACG'
 * ```
 */
export function complement(sequence: string): Either.Either<string, InvalidBaseError> {
  const upper = sequence.toUpperCase();
  const result = new Array<string>(upper.length);

  for (let i = 0; i < upper.length; i++) {
    const base = upper.charAt(i);
    const comp = DNA_COMPLEMENT_MAP[base];
    if (comp === undefined) {
      return Either.left(new InvalidBaseError(base, i));
    }
    result[i] = comp;
  }

  return Either.right(result.join(""));
}

/**
 * Reverse a sequence (simple string reversal)
 */
export function reverse(sequence: string): string {
  return sequence.split("").reverse().join("");
}

/**
 * Reverse complement of a DNA sequence, upper-cased
 *
 * @example
 * ```typescript
 * const rc = reverseComplement('ATGC');
 * Either.getOrThrow(rc); // 'GCAT'
 *
 * Either.isLeft(reverseComplement('ATXG')); // true
 * ```
 */
export function reverseComplement(sequence: string): Either.Either<string, InvalidBaseError> {
  return Either.map(complement(sequence), reverse);
}

/**
 * True when the sequence reads the same as its reverse complement
 */
export function isReverseComplementPalindrome(sequence: string): boolean {
  return Either.match(reverseComplement(sequence), {
    onLeft: () => false,
    onRight: (rc) => sequence.length > 0 && rc === sequence.toUpperCase(),
  });
}
