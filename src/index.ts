/**
 * probe-locator - exact probe matching on both DNA strands
 *
 * Finds every forward and reverse-complement occurrence of short probe
 * sequences in a target sequence, with 1-based inclusive coordinates.
 */

// Error types
export {
  createContextualError,
  DSVParseError,
  EmptyInputError,
  ERROR_SUGGESTIONS,
  FileError,
  InvalidAlphabetError,
  InvalidBaseError,
  ParseError,
  ProbeLoadError,
  ProbeLocatorError,
  ValidationError,
} from "./errors";
// Probe and match tables
export { formatMatchesCSV, formatMatchTable, formatSearchSummary, MATCH_COLUMNS } from "./formats/matches";
export {
  describeInvalidProbes,
  HEADER_KEYWORDS,
  looksLikeHeader,
  type ParsedProbeTable,
  parseProbeCSV,
} from "./formats/probes";
// File I/O
export { readTextFile, readTextFileEffect, type ReadTextOptions } from "./io/file-reader";
export { writeString, writeStringEffect } from "./io/file-writer";
export { getPlatform, runWithPlatform } from "./io/runtime";
// Core operations
export { countOccurrences, findOccurrences } from "./operations/core/matching";
export {
  complement,
  isReverseComplementPalindrome,
  reverse,
  reverseComplement,
} from "./operations/core/sequence-manipulation";
export {
  findInvalidBases,
  isValidSequence,
  normalizeSequence,
  SequenceValidator,
  STRICT_DNA,
} from "./operations/core/sequence-validation";
export { findMatches } from "./operations/match";
export { searchProbes } from "./operations/search";
// Pipeline
export {
  loadProbes,
  loadProbesEffect,
  matchProbeFile,
  type ProbeSearchReport,
  runProbeSearch,
} from "./pipeline";
// Types and schemas
export {
  DEFAULT_ORIENTATION_LABELS,
  FilePathSchema,
  type InvalidProbe,
  type InvalidProbeReason,
  type LogLevelName,
  type MatchCSVOptions,
  MatchCSVOptionsSchema,
  type MatchRecord,
  Orientation,
  type OrientationLabels,
  OrientationLabelsSchema,
  type Probe,
  type ProbeCSVOptions,
  ProbeCSVOptionsSchema,
  type ProbeInput,
  ProbeInputSchema,
  type ProbeSearchRequest,
  ProbeSearchRequestSchema,
  type ProbeValidationResult,
  type SearchResult,
  type SearchSummary,
} from "./types";
