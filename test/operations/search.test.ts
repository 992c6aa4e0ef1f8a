import { describe, expect, test } from "vitest";
import { searchProbes } from "../../src/operations/search";
import type { Probe } from "../../src/types";
import { Orientation } from "../../src/types";

describe("searchProbes", () => {
  const probes: Probe[] = [
    { name: "p1", sequence: "AT" },
    { name: "p2", sequence: "GGGG" },
    { name: "p3", sequence: "GCA" },
  ];
  const target = "ATATGCA";

  test("concatenates per-probe results in probe order", () => {
    const { matches } = searchProbes(probes, target);

    expect(matches.map((m) => [m.probeName, m.orientation, m.start])).toEqual([
      ["p1", Orientation.FORWARD, 1],
      ["p1", Orientation.FORWARD, 3],
      ["p1", Orientation.REVERSE_COMPLEMENT, 1],
      ["p1", Orientation.REVERSE_COMPLEMENT, 3],
      ["p3", Orientation.FORWARD, 5],
      ["p3", Orientation.REVERSE_COMPLEMENT, 4],
    ]);
  });

  test("summarizes counts and probes without hits", () => {
    const { summary } = searchProbes(probes, target);

    expect(summary).toEqual({
      probeCount: 3,
      matchCount: 6,
      forwardCount: 3,
      reverseComplementCount: 3,
      probesWithoutMatches: ["p2"],
    });
  });

  test("handles an empty probe list", () => {
    expect(searchProbes([], target)).toEqual({
      matches: [],
      summary: {
        probeCount: 0,
        matchCount: 0,
        forwardCount: 0,
        reverseComplementCount: 0,
        probesWithoutMatches: [],
      },
    });
  });

  test("keeps duplicate probe names as separate entries", () => {
    const { matches, summary } = searchProbes(
      [
        { name: "dup", sequence: "TG" },
        { name: "dup", sequence: "TG" },
      ],
      target
    );

    // TG at 4; its reverse complement CA at 6
    expect(matches).toHaveLength(4);
    expect(summary.probeCount).toBe(2);
  });

  test("returns the same result on repeated runs", () => {
    expect(searchProbes(probes, target)).toEqual(searchProbes(probes, target));
  });
});
