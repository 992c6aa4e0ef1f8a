/**
 * Probe search pipeline
 *
 * Loads a probe table, validates the target, runs the batch search and
 * optionally exports the match table. Each step is an Effect program so the
 * whole run can be composed, logged and executed on the Node platform.
 */

import type { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect, Logger, LogLevel } from "effect";
import { ERROR_SUGGESTIONS, ParseError, ProbeLoadError, ProbeLocatorError, ValidationError } from "./errors";
import { formatMatchesCSV, formatSearchSummary } from "./formats/matches";
import type { ParsedProbeTable } from "./formats/probes";
import { describeInvalidProbes, parseProbeCSV } from "./formats/probes";
import { readTextFileEffect } from "./io/file-reader";
import { writeStringEffect } from "./io/file-writer";
import { runWithPlatform } from "./io/runtime";
import { SequenceValidator } from "./operations/core/sequence-validation";
import { searchProbes } from "./operations/search";
import type {
  InvalidProbe,
  Probe,
  ProbeCSVOptions,
  ProbeSearchRequest,
  SearchResult,
} from "./types";
import { ProbeSearchRequestSchema } from "./types";

export interface ProbeSearchReport extends SearchResult {
  readonly probes: readonly Probe[];
  readonly invalid: readonly InvalidProbe[];
  /** Normalized target the probes were searched against */
  readonly target: string;
  /** Where the match table was written, when requested */
  readonly outputPath?: string;
}

function asLocatorError(error: unknown): ProbeLocatorError {
  if (error instanceof ProbeLocatorError) {
    return error;
  }
  return new ParseError(error instanceof Error ? error.message : String(error), "csv");
}

/**
 * Read and parse a probe table, failing when no usable probe remains
 */
export function loadProbesEffect(
  path: string,
  options: ProbeCSVOptions = {}
): Effect.Effect<ParsedProbeTable, ProbeLocatorError, FileSystem.FileSystem> {
  return Effect.gen(function* () {
    const text = yield* readTextFileEffect(path);
    const table = yield* Effect.try({
      try: () => parseProbeCSV(text, options),
      catch: asLocatorError,
    });

    if (table.probes.length === 0) {
      return yield* Effect.fail(
        new ProbeLoadError(
          table.invalid.length === 0
            ? `No valid probe data found in ${path}`
            : `No valid probes found in ${path}`,
          path,
          table.invalid.length,
          table.invalid.length === 0
            ? ERROR_SUGGESTIONS.NO_VALID_PROBES
            : describeInvalidProbes(table.invalid)
        )
      );
    }

    return table;
  });
}

/**
 * Read and parse a probe table
 *
 * @throws {ProbeLoadError} When the table holds no valid probe
 * @throws {FileError} When the file cannot be read
 */
export async function loadProbes(
  path: string,
  options: ProbeCSVOptions = {}
): Promise<ParsedProbeTable> {
  return runWithPlatform(loadProbesEffect(path, options));
}

/**
 * The full search as an Effect program
 */
export function runProbeSearch(
  request: ProbeSearchRequest
): Effect.Effect<ProbeSearchReport, ProbeLocatorError, FileSystem.FileSystem | Path.Path> {
  const validated = ProbeSearchRequestSchema(request);
  if (validated instanceof type.errors) {
    return Effect.fail(new ValidationError(`Invalid probe search request: ${validated.summary}`));
  }

  const program = Effect.gen(function* () {
    const table = yield* loadProbesEffect(validated.probeFile, validated.csv);
    yield* Effect.logInfo(`Loaded ${table.probes.length} probe(s)`);
    if (table.invalid.length > 0) {
      yield* Effect.logWarning(describeInvalidProbes(table.invalid));
    }

    const target = yield* Effect.try({
      try: () => new SequenceValidator().prepareTarget(validated.target),
      catch: asLocatorError,
    });

    const result = searchProbes(table.probes, target);
    yield* Effect.logInfo(formatSearchSummary(result.summary));

    const report: ProbeSearchReport = {
      probes: table.probes,
      invalid: table.invalid,
      target,
      matches: result.matches,
      summary: result.summary,
    };

    const output = validated.output;
    if (output === undefined) {
      return report;
    }

    const csv = yield* Effect.try({
      try: () => formatMatchesCSV(result.matches, validated.report),
      catch: asLocatorError,
    });
    yield* writeStringEffect(output, csv);
    yield* Effect.logInfo(`Results saved to ${output}`);

    return { ...report, outputPath: output };
  });

  return program.pipe(
    Effect.annotateLogs("probeFile", validated.probeFile),
    Logger.withMinimumLogLevel(LogLevel.fromLiteral(validated.logLevel ?? "Info"))
  );
}

/**
 * Run the full search on the Node platform
 *
 * @example
 * ```typescript
 * const report = await matchProbeFile({
 *   probeFile: 'probes.csv',
 *   target: 'ATGCGATACGCTTGA',
 *   output: 'probe_matches.csv',
 * });
 * console.log(formatMatchTable(report.matches));
 * ```
 */
export async function matchProbeFile(request: ProbeSearchRequest): Promise<ProbeSearchReport> {
  return runWithPlatform(runProbeSearch(request));
}
