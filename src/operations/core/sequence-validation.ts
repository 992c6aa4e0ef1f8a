/**
 * Sequence validation for the four canonical DNA bases
 *
 * `isValidSequence` is the plain predicate used everywhere; the
 * `SequenceValidator` class adds the boundary checks that turn raw probe rows
 * and pasted target text into values the match engine can trust.
 *
 * @module sequence-validation
 */

import { type } from "arktype";
import {
  createContextualError,
  EmptyInputError,
  ERROR_SUGGESTIONS,
  InvalidAlphabetError,
  ValidationError,
} from "../../errors";
import type { InvalidProbe, Probe, ProbeInput, ProbeValidationResult } from "../../types";
import { ProbeInputSchema } from "../../types";

// =============================================================================
// PATTERN CONSTANTS
// =============================================================================

/**
 * Strict DNA pattern: A, C, G, T in either case, nothing else
 */
export const STRICT_DNA: RegExp = /^[ACGTacgt]*$/;

const INVALID_BASE = /[^ACGT]/g;

const WHITESPACE = /\s+/g;

// =============================================================================
// PREDICATES
// =============================================================================

/**
 * Check that every character is A, T, G or C (case-insensitive).
 * The empty string is valid; callers gate emptiness separately.
 *
 * @example
 * ```typescript
 * isValidSequence('atgc'); // true
 * isValidSequence('ATXG'); // false
 * isValidSequence('');     // true
 * ```
 */
export function isValidSequence(sequence: string): boolean {
  return STRICT_DNA.test(sequence);
}

/**
 * Distinct characters outside A, T, G, C, upper-cased, in order of first appearance
 */
export function findInvalidBases(sequence: string): string[] {
  const found = sequence.toUpperCase().match(INVALID_BASE) ?? [];
  return [...new Set(found)];
}

/**
 * Strip all whitespace and upper-case
 */
export function normalizeSequence(sequence: string): string {
  return sequence.replace(WHITESPACE, "").toUpperCase();
}

// =============================================================================
// SEQUENCE VALIDATOR CLASS
// =============================================================================

/**
 * Boundary validator for probes and targets
 *
 * @example
 * ```typescript
 * const validator = new SequenceValidator();
 * const target = validator.prepareTarget('atg cga\nttA');  // 'ATGCGATTA'
 * const { probes, invalid } = validator.partitionProbes([
 *   { name: 'p1', sequence: 'atgc' },
 *   { name: 'p2', sequence: 'ATXG' },
 * ]);
 * ```
 */
export class SequenceValidator {
  /**
   * Validate a single probe, throwing on the first problem
   */
  assertProbe(input: ProbeInput): Probe {
    const outcome = this.checkProbe(input);
    if ("probe" in outcome) {
      return outcome.probe;
    }

    const { rejected } = outcome;
    if (rejected.reason === "invalid-alphabet") {
      throw new InvalidAlphabetError(
        `Probe '${rejected.name}' contains invalid bases: ${rejected.invalidBases.join(", ")}`,
        rejected.invalidBases,
        rejected.lineNumber,
        ERROR_SUGGESTIONS.INVALID_NUCLEOTIDE
      );
    }
    throw createContextualError(
      EmptyInputError,
      rejected.reason === "empty-name" ? "Probe name is empty" : "Probe sequence is empty",
      {
        lineNumber: rejected.lineNumber,
        context: ERROR_SUGGESTIONS.EMPTY_PROBE,
      }
    );
  }

  /**
   * Split raw probe rows into usable probes and a rejection list.
   * Never throws for bad rows; input order is kept on both sides.
   */
  partitionProbes(inputs: readonly ProbeInput[]): ProbeValidationResult {
    const probes: Probe[] = [];
    const invalid: InvalidProbe[] = [];

    for (const input of inputs) {
      const outcome = this.checkProbe(input);
      if ("probe" in outcome) {
        probes.push(outcome.probe);
      } else {
        invalid.push(outcome.rejected);
      }
    }

    return { probes, invalid };
  }

  /**
   * Normalize pasted target text and validate it
   *
   * @throws {EmptyInputError} When nothing but whitespace was given
   * @throws {InvalidAlphabetError} When a non-ACGT character remains
   */
  prepareTarget(raw: string): string {
    const target = normalizeSequence(raw);

    if (target.length === 0) {
      throw createContextualError(EmptyInputError, "Target sequence is empty", {
        context: ERROR_SUGGESTIONS.EMPTY_TARGET,
      });
    }

    if (!isValidSequence(target)) {
      const invalidBases = findInvalidBases(target);
      throw new InvalidAlphabetError(
        `Target sequence contains invalid characters: ${invalidBases.join(", ")}`,
        invalidBases,
        undefined,
        ERROR_SUGGESTIONS.INVALID_NUCLEOTIDE
      );
    }

    return target;
  }

  private checkProbe(input: ProbeInput): { probe: Probe } | { rejected: InvalidProbe } {
    const shape = ProbeInputSchema(input);
    if (shape instanceof type.errors) {
      throw new ValidationError(`Invalid probe input: ${shape.summary}`);
    }

    const name = input.name.trim();
    const sequence = input.sequence.trim().toUpperCase();
    const lineNumber = input.lineNumber;

    if (name.length === 0) {
      return { rejected: { name, sequence, reason: "empty-name", invalidBases: [], lineNumber } };
    }
    if (sequence.length === 0) {
      return {
        rejected: { name, sequence, reason: "empty-sequence", invalidBases: [], lineNumber },
      };
    }
    if (!isValidSequence(sequence)) {
      return {
        rejected: {
          name,
          sequence,
          reason: "invalid-alphabet",
          invalidBases: findInvalidBases(sequence),
          lineNumber,
        },
      };
    }

    return { probe: lineNumber === undefined ? { name, sequence } : { name, sequence, lineNumber } };
  }
}
