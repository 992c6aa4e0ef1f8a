/**
 * CSV State Machine Module
 *
 * Implements RFC 4180 compliant CSV parsing using a state machine approach.
 * Handles quoted fields, escaped quotes, and multi-line fields.
 */

import { DSVParseError } from "../../errors";
import { DEFAULT_ESCAPE, DEFAULT_QUOTE, UTF8_BOM } from "./constants";
import type { DSVRow } from "./types";
import { CSVParseState } from "./types";

interface RowScan {
  readonly fields: string[];
  readonly currentField: string;
  readonly state: CSVParseState;
}

/**
 * Run the RFC 4180 state machine over a (possibly partial) row.
 *
 * A quote only opens a quoted field at the start of a field; anywhere else in
 * an unquoted field it is kept as a literal character.
 */
function scanRow(line: string, delimiter: string, quote: string, escapeChar: string): RowScan {
  const fields: string[] = [];
  let currentField = "";
  let state = CSVParseState.FIELD_START;
  let i = 0;

  while (i < line.length) {
    const char = line.charAt(i);
    const nextChar = line.charAt(i + 1);

    switch (state) {
      case CSVParseState.FIELD_START:
        if (char === quote) {
          state = CSVParseState.QUOTED_FIELD;
        } else if (char === delimiter) {
          fields.push("");
        } else {
          currentField = char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        i++;
        break;

      case CSVParseState.UNQUOTED_FIELD:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          currentField += char;
        }
        i++;
        break;

      case CSVParseState.QUOTED_FIELD:
        if (char === quote) {
          if (escapeChar === quote && nextChar === quote) {
            // Escaped quote (doubled)
            currentField += quote;
            i += 2;
          } else {
            state = CSVParseState.QUOTE_IN_QUOTED;
            i++;
          }
        } else {
          currentField += char;
          i++;
        }
        break;

      case CSVParseState.QUOTE_IN_QUOTED:
        if (char === delimiter) {
          fields.push(currentField);
          currentField = "";
          state = CSVParseState.FIELD_START;
        } else {
          // Characters after closing quote: keep them as part of the field
          currentField += char;
          state = CSVParseState.UNQUOTED_FIELD;
        }
        i++;
        break;
    }
  }

  return { fields, currentField, state };
}

/**
 * Check whether a row ends inside an open quoted field, so that the next
 * physical line belongs to the same row
 */
export function endsInsideQuotedField(
  line: string,
  delimiter: string = ",",
  quote: string = DEFAULT_QUOTE,
  escapeChar: string = DEFAULT_ESCAPE
): boolean {
  return scanRow(line, delimiter, quote, escapeChar).state === CSVParseState.QUOTED_FIELD;
}

/**
 * Parse CSV row with proper RFC 4180 state machine
 *
 * @param line - CSV row to parse (may contain newlines inside quoted fields)
 * @param delimiter - Field delimiter
 * @param quote - Quote character
 * @param escapeChar - Escape character (usually same as quote)
 * @param lineNumber - Row start, used in error reports
 * @throws {DSVParseError} When a quoted field is never closed
 */
export function parseCSVRow(
  line: string,
  delimiter: string = ",",
  quote: string = DEFAULT_QUOTE,
  escapeChar: string = DEFAULT_ESCAPE,
  lineNumber?: number
): string[] {
  const { fields, currentField, state } = scanRow(line, delimiter, quote, escapeChar);

  if (state === CSVParseState.QUOTED_FIELD) {
    throw new DSVParseError("Unclosed quote in CSV field", lineNumber, fields.length + 1, line);
  } else if (state === CSVParseState.UNQUOTED_FIELD || state === CSVParseState.QUOTE_IN_QUOTED) {
    fields.push(currentField);
  } else if (line.endsWith(delimiter)) {
    // Trailing delimiter means empty final field
    fields.push("");
  }

  return fields;
}

/**
 * Split text into logical rows.
 *
 * Physical lines are joined while a quoted field is still open so that quoted
 * fields may contain line breaks. Blank lines are skipped. A leading byte order mark
 * is dropped.
 */
export function splitRows(
  text: string,
  delimiter: string = ",",
  quote: string = DEFAULT_QUOTE,
  escapeChar: string = DEFAULT_ESCAPE
): DSVRow[] {
  const source = text.startsWith(UTF8_BOM) ? text.slice(UTF8_BOM.length) : text;
  const lines = source.split(/\r\n|\n|\r/);
  const rows: DSVRow[] = [];

  let pending: string | undefined;
  let pendingLine = 0;

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index] ?? "";
    if (pending === undefined) {
      if (line.trim() === "") {
        continue;
      }
      pending = line;
      pendingLine = index + 1;
    } else {
      pending += `\n${line}`;
    }

    if (!endsInsideQuotedField(pending, delimiter, quote, escapeChar)) {
      rows.push({
        fields: parseCSVRow(pending, delimiter, quote, escapeChar, pendingLine),
        lineNumber: pendingLine,
      });
      pending = undefined;
    }
  }

  if (pending !== undefined) {
    // Throws for an unclosed quoted field
    rows.push({
      fields: parseCSVRow(pending, delimiter, quote, escapeChar, pendingLine),
      lineNumber: pendingLine,
    });
  }

  return rows;
}

/**
 * CSV Field Parser class for encapsulated field parsing
 */
export class CSVFieldParser {
  constructor(
    private readonly delimiter: string = ",",
    private readonly quote: string = DEFAULT_QUOTE,
    private readonly escapeChar: string = DEFAULT_ESCAPE
  ) {}

  parseRow(line: string, lineNumber?: number): string[] {
    return parseCSVRow(line, this.delimiter, this.quote, this.escapeChar, lineNumber);
  }

  splitRows(text: string): DSVRow[] {
    return splitRows(text, this.delimiter, this.quote, this.escapeChar);
  }
}
