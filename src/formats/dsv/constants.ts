/**
 * DSV Format Constants
 */

/**
 * Default delimiter for different formats
 */
export const DEFAULT_DELIMITERS = {
  csv: ",",
} as const;

/**
 * Default quote character (RFC 4180 compliant)
 */
export const DEFAULT_QUOTE = '"';

/**
 * Default escape character (doubling quotes per RFC 4180)
 */
export const DEFAULT_ESCAPE = '"';

/**
 * UTF-8 byte order mark, as written by spreadsheet exports
 */
export const UTF8_BOM = "\uFEFF";

/**
 * Excel-specific gene name patterns that get corrupted
 * Examples: SEPT1 → Sep-1, MARCH1 → Mar-1
 */
export const EXCEL_GENE_PATTERNS = [
  /^(JAN|FEB|MAR|APR|MAY|JUN|JUL|AUG|SEP|SEPT|OCT|NOV|DEC)\d+$/i,
  /^(JANUARY|FEBRUARY|MARCH|APRIL|MAY|JUNE|JULY|AUGUST|SEPTEMBER|OCTOBER|NOVEMBER|DECEMBER)\d+$/i,
] as const;

/**
 * Line ending options
 */
export const LINE_ENDINGS = {
  windows: "\r\n",
} as const;
