/**
 * @module formats/dsv/writer
 * @description DSV row formatting
 *
 * - RFC 4180 quoting: fields with the delimiter, a quote, CR or LF are quoted
 *   and inner quotes doubled
 * - Optional Excel protection for gene-like names
 */

import { DEFAULT_ESCAPE, DEFAULT_QUOTE } from "./constants";
import { needsExcelProtection } from "./excel-protection";
import type { DSVFieldFormatOptions } from "./types";

const DEFAULT_FORMAT_OPTIONS: DSVFieldFormatOptions = {
  delimiter: ",",
  quote: DEFAULT_QUOTE,
  escapeChar: DEFAULT_ESCAPE,
  quoteAll: false,
  excelCompatible: false,
};

/**
 * DSVRowFormatter - turns field values into delimited lines
 */
export class DSVRowFormatter {
  private readonly options: DSVFieldFormatOptions;

  constructor(options: Partial<DSVFieldFormatOptions> = {}) {
    this.options = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  }

  /**
   * Format a single field with proper escaping
   */
  formatField(value: string | number | null | undefined): string {
    if (value === null || value === undefined) return "";

    const { delimiter, quote, escapeChar, quoteAll, excelCompatible } = this.options;
    const field = String(value);

    const needsQuoting =
      quoteAll ||
      field.includes(delimiter) ||
      field.includes(quote) ||
      field.includes("\n") ||
      field.includes("\r") ||
      (excelCompatible && needsExcelProtection(field));

    if (!needsQuoting) {
      return field;
    }

    const escaped = field.split(quote).join(escapeChar + quote);
    return quote + escaped + quote;
  }

  /**
   * Format a row of fields (without line ending)
   */
  formatRow(values: ReadonlyArray<string | number | null | undefined>): string {
    return values.map((value) => this.formatField(value)).join(this.options.delimiter);
  }
}
