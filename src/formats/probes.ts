/**
 * Probe table reader
 *
 * Reads `name,sequence` rows from CSV text. The first row is treated as a
 * header when it mentions a column-like word; rows with a missing name or
 * sequence are skipped, rows with non-ACGT sequences are collected for the
 * rejection report instead of being thrown.
 */

import { type } from "arktype";
import { EmptyInputError, ValidationError } from "../errors";
import { SequenceValidator } from "../operations/core/sequence-validation";
import type { InvalidProbe, ProbeCSVOptions, ProbeInput, ProbeValidationResult } from "../types";
import { ProbeCSVOptionsSchema } from "../types";
import { DEFAULT_DELIMITERS } from "./dsv/constants";
import { CSVFieldParser } from "./dsv/state-machine";
import type { DSVRow } from "./dsv/types";

/**
 * Words that mark the first row as a header row
 */
export const HEADER_KEYWORDS = ["probe", "name", "sequence", "id", "label"] as const;

export interface ParsedProbeTable extends ProbeValidationResult {
  readonly headerDetected: boolean;
}

/**
 * Check whether a row looks like a header: its first or second field,
 * lower-cased, contains one of the header keywords
 */
export function looksLikeHeader(fields: readonly string[]): boolean {
  const candidates = fields.slice(0, 2).map((field) => field.toLowerCase());
  return HEADER_KEYWORDS.some((keyword) =>
    candidates.some((candidate) => candidate.includes(keyword))
  );
}

/**
 * Parse probe table text into probes and rejected rows
 *
 * @throws {EmptyInputError} When the text holds no rows at all
 * @throws {ValidationError} When the options are malformed
 *
 * @example
 * ```typescript
 * const { probes, invalid } = parseProbeCSV('name,sequence\np1,atgc\np2,ATXG\n');
 * // probes:  [{ name: 'p1', sequence: 'ATGC', lineNumber: 2 }]
 * // invalid: [{ name: 'p2', sequence: 'ATXG', reason: 'invalid-alphabet', ... }]
 * ```
 */
export function parseProbeCSV(text: string, options: ProbeCSVOptions = {}): ParsedProbeTable {
  const validated = ProbeCSVOptionsSchema(options);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid probe CSV options: ${validated.summary}`);
  }

  const parser = new CSVFieldParser(options.delimiter ?? DEFAULT_DELIMITERS.csv);
  const rows = parser.splitRows(text);

  const [first, ...rest] = rows;
  if (first === undefined) {
    throw new EmptyInputError("Probe CSV is empty");
  }

  const header = options.header ?? "auto";
  const headerDetected = header === "auto" ? looksLikeHeader(first.fields) : header;
  const dataRows = headerDetected ? rest : rows;

  const inputs = dataRows.flatMap((row) => {
    const input = toProbeInput(row);
    return input === undefined ? [] : [input];
  });

  const { probes, invalid } = new SequenceValidator().partitionProbes(inputs);
  return { probes, invalid, headerDetected };
}

function toProbeInput(row: DSVRow): ProbeInput | undefined {
  const [rawName, rawSequence] = row.fields;
  if (rawName === undefined || rawSequence === undefined) {
    return undefined;
  }

  const name = rawName.trim();
  const sequence = rawSequence.trim();
  if (name === "" || sequence === "") {
    return undefined;
  }

  return { name, sequence, lineNumber: row.lineNumber };
}

function describeRejection(probe: InvalidProbe): string {
  switch (probe.reason) {
    case "invalid-alphabet":
      return `${probe.name}: ${probe.sequence}`;
    case "empty-sequence":
      return `${probe.name}: (empty sequence)`;
    case "empty-name":
      return `(unnamed): ${probe.sequence}`;
  }
}

/**
 * Human-readable rejection summary for a probe table.
 * The alphabet hint is only given when every rejection is an alphabet problem.
 *
 * @param limit - Number of rejected rows listed before eliding the rest
 */
export function describeInvalidProbes(invalid: readonly InvalidProbe[], limit: number = 5): string {
  if (invalid.length === 0) {
    return "All probes are valid.";
  }

  const alphabetOnly = invalid.every((probe) => probe.reason === "invalid-alphabet");
  const lines = alphabetOnly
    ? [
        `Found ${invalid.length} probe(s) with invalid sequences.`,
        "Invalid probes (only A, T, G, C allowed):",
      ]
    : [`Found ${invalid.length} rejected probe(s).`, "Rejected probes:"];
  lines.push(...invalid.slice(0, limit).map((probe) => `  • ${describeRejection(probe)}`));
  if (invalid.length > limit) {
    lines.push(`  ... and ${invalid.length - limit} more`);
  }

  return lines.join("\n");
}
