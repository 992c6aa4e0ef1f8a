/**
 * Batch search of many probes against one target
 */

import type { MatchRecord, Probe, SearchResult, SearchSummary } from "../types";
import { Orientation } from "../types";
import { findMatches } from "./match";

/**
 * Run the match engine once per probe against a shared target.
 *
 * Per-probe results are concatenated in probe order, so the output is stable
 * for a given probe list.
 */
export function searchProbes(probes: readonly Probe[], target: string): SearchResult {
  const perProbe = probes.map((probe) => findMatches(probe, target));
  const matches = perProbe.flat();

  return {
    matches,
    summary: summarize(probes, perProbe, matches),
  };
}

function summarize(
  probes: readonly Probe[],
  perProbe: readonly MatchRecord[][],
  matches: readonly MatchRecord[]
): SearchSummary {
  const forwardCount = matches.filter((m) => m.orientation === Orientation.FORWARD).length;

  return {
    probeCount: probes.length,
    matchCount: matches.length,
    forwardCount,
    reverseComplementCount: matches.length - forwardCount,
    probesWithoutMatches: probes
      .filter((_, index) => perProbe[index]?.length === 0)
      .map((probe) => probe.name),
  };
}
