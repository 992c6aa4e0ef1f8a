/**
 * Match table rendering
 *
 * CSV export and a plain-text table for match records. Orientation is shown
 * with two distinct labels, by default 5′→3′ for same-strand and 3′→5′ for
 * complementary-strand matches.
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { MatchCSVOptions, MatchRecord, OrientationLabels, SearchSummary } from "../types";
import { DEFAULT_ORIENTATION_LABELS, MatchCSVOptionsSchema, OrientationLabelsSchema } from "../types";
import { DEFAULT_DELIMITERS, LINE_ENDINGS } from "./dsv/constants";
import { DSVRowFormatter } from "./dsv/writer";

export const MATCH_COLUMNS = [
  "Probe Name",
  "Match Type",
  "Start Position",
  "End Position",
  "Matched Sequence",
] as const;

function toRow(match: MatchRecord, labels: OrientationLabels): [string, string, number, number, string] {
  return [match.probeName, labels[match.orientation], match.start, match.end, match.matchedText];
}

/**
 * Render match records as CSV, header first, one row per record.
 * Every row, the last included, ends with the line ending.
 *
 * @throws {ValidationError} When the options are malformed or the labels coincide
 */
export function formatMatchesCSV(
  matches: readonly MatchRecord[],
  options: MatchCSVOptions = {}
): string {
  const validated = MatchCSVOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid match CSV options: ${validated.summary}`);
  }

  const labels = options.labels ?? DEFAULT_ORIENTATION_LABELS;
  const lineEnding = options.lineEnding ?? LINE_ENDINGS.windows;
  const formatter = new DSVRowFormatter({
    delimiter: options.delimiter ?? DEFAULT_DELIMITERS.csv,
    excelCompatible: options.excelCompatible ?? false,
  });

  const lines = [
    formatter.formatRow(MATCH_COLUMNS),
    ...matches.map((match) => formatter.formatRow(toRow(match, labels))),
  ];

  return lines.map((line) => line + lineEnding).join("");
}

/**
 * Render match records as a column-aligned text table
 *
 * @example
 * ```typescript
 * console.log(formatMatchTable(result.matches));
 * // Probe Name  Match Type  Start Position  End Position  Matched Sequence
 * // ----------  ----------  --------------  ------------  ----------------
 * // p1          5′→3′       1               2             AT
 * ```
 */
export function formatMatchTable(
  matches: readonly MatchRecord[],
  labels: OrientationLabels = DEFAULT_ORIENTATION_LABELS
): string {
  const validated = OrientationLabelsSchema(labels);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid orientation labels: ${validated.summary}`);
  }

  const rows = matches.map((match) => toRow(match, labels).map(String));
  const widths = MATCH_COLUMNS.map((column, index) =>
    Math.max(column.length, ...rows.map((row) => row[index]?.length ?? 0))
  );

  const render = (cells: readonly string[]): string =>
    cells
      .map((cell, index) => cell.padEnd(widths[index] ?? 0))
      .join("  ")
      .trimEnd();

  return [
    render(MATCH_COLUMNS),
    render(widths.map((width) => "-".repeat(width))),
    ...rows.map(render),
  ].join("\n");
}

/**
 * One-line summary of a search
 */
export function formatSearchSummary(summary: SearchSummary): string {
  if (summary.matchCount === 0) {
    return "No matches found";
  }
  return (
    `Found ${summary.matchCount} match(es) across ${summary.probeCount} probe(s): ` +
    `${summary.forwardCount} forward, ${summary.reverseComplementCount} reverse complement`
  );
}
