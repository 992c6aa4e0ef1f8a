/**
 * Match engine - forward and reverse-complement probe location
 *
 * A pure function of (probe, target): no state is kept between calls and the
 * same inputs always yield the same records in the same order.
 */

import { Either } from "effect";
import type { MatchRecord, Probe } from "../types";
import { Orientation } from "../types";
import { findOccurrences } from "./core/matching";
import { reverseComplement } from "./core/sequence-manipulation";

/**
 * Find every exact occurrence of a probe in a target.
 *
 * Returns forward hits in ascending position, then reverse-complement hits in
 * ascending position. Overlapping hits are all reported. A probe that equals
 * its own reverse complement is reported under both orientations.
 *
 * A probe whose reverse complement cannot be formed (a non-ACGT base) gets no
 * reverse-complement records; nothing is thrown. An empty probe has no matches.
 *
 * @example
 * ```typescript
 * findMatches({ name: 'p1', sequence: 'AT' }, 'ATAT');
 * // forward at 1-2 and 3-4, reverse-complement at 1-2 and 3-4
 * ```
 */
export function findMatches(probe: Probe, target: string): MatchRecord[] {
  const needle = probe.sequence.toUpperCase();
  if (needle.length === 0) {
    return [];
  }

  const haystack = target.toUpperCase();
  const records = scan(probe.name, haystack, needle, Orientation.FORWARD);

  const rc = reverseComplement(needle);
  if (Either.isRight(rc)) {
    records.push(...scan(probe.name, haystack, rc.right, Orientation.REVERSE_COMPLEMENT));
  }

  return records;
}

function scan(
  probeName: string,
  haystack: string,
  needle: string,
  orientation: Orientation
): MatchRecord[] {
  return findOccurrences(haystack, needle).map((pos) => ({
    probeName,
    orientation,
    start: pos + 1,
    end: pos + needle.length,
    matchedText: haystack.slice(pos, pos + needle.length),
  }));
}
