/**
 * Core type definitions for probe matching
 *
 * Plain interfaces describe the values that flow through the engine; arktype
 * schemas validate the option objects accepted at the public boundary.
 */

import { type } from "arktype";

// =============================================================================
// DOMAIN VALUES
// =============================================================================

/**
 * Strand a match was found on, relative to the probe as written
 */
export const Orientation = {
  /** The probe's literal sequence occurs in the target */
  FORWARD: "forward",
  /** The probe's reverse complement occurs in the target */
  REVERSE_COMPLEMENT: "reverse-complement",
} as const;

export type Orientation = (typeof Orientation)[keyof typeof Orientation];

/**
 * A named probe, upper-cased and restricted to A, T, G, C
 */
export interface Probe {
  /** Caller-defined identifier, not required to be unique */
  readonly name: string;
  readonly sequence: string;
  /** Source row in the probe table, when loaded from one */
  readonly lineNumber?: number;
}

/**
 * One occurrence of a probe (or its reverse complement) in the target.
 * Coordinates are 1-based and inclusive.
 */
export interface MatchRecord {
  readonly probeName: string;
  readonly orientation: Orientation;
  readonly start: number;
  readonly end: number;
  readonly matchedText: string;
}

export type InvalidProbeReason = "invalid-alphabet" | "empty-sequence" | "empty-name";

/**
 * A probe rejected at the boundary, kept for batch reporting
 */
export interface InvalidProbe {
  readonly name: string;
  readonly sequence: string;
  readonly reason: InvalidProbeReason;
  /** Distinct offending characters, in order of first appearance */
  readonly invalidBases: readonly string[];
  readonly lineNumber?: number;
}

export interface ProbeValidationResult {
  readonly probes: readonly Probe[];
  readonly invalid: readonly InvalidProbe[];
}

export interface SearchSummary {
  readonly probeCount: number;
  readonly matchCount: number;
  readonly forwardCount: number;
  readonly reverseComplementCount: number;
  /** Names of probes with no hit in either orientation, in probe order */
  readonly probesWithoutMatches: readonly string[];
}

export interface SearchResult {
  readonly matches: readonly MatchRecord[];
  readonly summary: SearchSummary;
}

export type OrientationLabels = Readonly<Record<Orientation, string>>;

/**
 * Glyphs for same-strand and complementary-strand matches
 */
export const DEFAULT_ORIENTATION_LABELS: OrientationLabels = {
  [Orientation.FORWARD]: "5′→3′",
  [Orientation.REVERSE_COMPLEMENT]: "3′→5′",
};

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * Raw probe row as handed over by a caller, before alphabet checks
 */
export const ProbeInputSchema = type({
  name: "string",
  sequence: "string",
  "lineNumber?": "number.integer >= 1",
});

export type ProbeInput = typeof ProbeInputSchema.infer;

export const FilePathSchema = type("string > 0").narrow(
  (path, ctx) => !path.includes("\0") || ctx.mustBe("a path without NUL bytes")
);

export const OrientationLabelsSchema = type({
  forward: "string > 0",
  "reverse-complement": "string > 0",
}).narrow((labels, ctx) =>
  labels.forward !== labels["reverse-complement"]
    ? true
    : ctx.mustBe("two distinct orientation labels")
);

export const ProbeCSVOptionsSchema = type({
  "delimiter?": "string == 1",
  "header?": "'auto' | boolean",
});

export type ProbeCSVOptions = typeof ProbeCSVOptionsSchema.infer;

export const MatchCSVOptionsSchema = type({
  "delimiter?": "string == 1",
  "lineEnding?": type.enumerated("\n", "\r\n"),
  "labels?": OrientationLabelsSchema,
  "excelCompatible?": "boolean",
});

export type MatchCSVOptions = typeof MatchCSVOptionsSchema.infer;

export const LogLevelSchema = type("'All' | 'Debug' | 'Info' | 'Warning' | 'Error' | 'None'");

export type LogLevelName = typeof LogLevelSchema.infer;

export const ProbeSearchRequestSchema = type({
  probeFile: FilePathSchema,
  target: "string",
  "output?": FilePathSchema,
  "csv?": ProbeCSVOptionsSchema,
  "report?": MatchCSVOptionsSchema,
  "logLevel?": LogLevelSchema,
});

export type ProbeSearchRequest = typeof ProbeSearchRequestSchema.infer;
