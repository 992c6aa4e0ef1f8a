/**
 * Excel Protection Module
 *
 * Protects probe names from Excel's automatic conversions: gene names
 * (SEPT1 → Sep-1), leading zeros, long numbers and formula prefixes.
 */

import { EXCEL_GENE_PATTERNS } from "./constants";

/**
 * Check whether Excel would rewrite the field on import
 */
export function needsExcelProtection(field: string): boolean {
  if (EXCEL_GENE_PATTERNS.some((pattern) => pattern.test(field))) {
    return true;
  }

  // Leading zeros Excel would strip
  if (/^0+[0-9A-Za-z]/.test(field)) {
    return true;
  }

  // Numbers Excel turns into scientific notation
  if (/^\d{16,}$/.test(field)) {
    return true;
  }

  // Formula prefixes
  return /^[=+\-@]/.test(field);
}
