/**
 * DSV Format Type Definitions
 */

/**
 * States of the RFC 4180 row parser
 */
export enum CSVParseState {
  FIELD_START,
  UNQUOTED_FIELD,
  QUOTED_FIELD,
  QUOTE_IN_QUOTED,
}

/**
 * One logical row, possibly spanning several physical lines
 */
export interface DSVRow {
  readonly fields: readonly string[];
  /** 1-based physical line the row starts on */
  readonly lineNumber: number;
}

export interface DSVFieldFormatOptions {
  readonly delimiter: string;
  readonly quote: string;
  readonly escapeChar: string;
  readonly quoteAll: boolean;
  readonly excelCompatible: boolean;
}
