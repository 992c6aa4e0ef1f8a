/**
 * Tests for the CSV row parser and row formatter
 */

import { describe, expect, test } from "vitest";
import { DSVParseError } from "../../src/errors";
import { needsExcelProtection } from "../../src/formats/dsv/excel-protection";
import {
  CSVFieldParser,
  endsInsideQuotedField,
  parseCSVRow,
  splitRows,
} from "../../src/formats/dsv/state-machine";
import { DSVRowFormatter } from "../../src/formats/dsv/writer";

describe("parseCSVRow", () => {
  test("splits plain fields", () => {
    expect(parseCSVRow("p1,ATGC,extra")).toEqual(["p1", "ATGC", "extra"]);
  });

  test("keeps delimiters inside quoted fields", () => {
    expect(parseCSVRow('"probe, first",ATGC')).toEqual(["probe, first", "ATGC"]);
  });

  test("unescapes doubled quotes", () => {
    expect(parseCSVRow('"say ""hi""",AT')).toEqual(['say "hi"', "AT"]);
  });

  test("keeps a quote inside an unquoted field", () => {
    expect(parseCSVRow('5"cap,ATGC')).toEqual(['5"cap', "ATGC"]);
  });

  test("keeps empty fields, including a trailing one", () => {
    expect(parseCSVRow(",AT,")).toEqual(["", "AT", ""]);
  });

  test("supports other delimiters", () => {
    expect(parseCSVRow("p1\tATGC", "\t")).toEqual(["p1", "ATGC"]);
  });

  test("throws DSVParseError for an unclosed quote", () => {
    expect(() => parseCSVRow('"p1,ATGC', ",", '"', '"', 3)).toThrow(DSVParseError);
    expect(() => parseCSVRow('"p1,ATGC', ",", '"', '"', 3)).toThrow(
      "Unclosed quote in CSV field (line 3, column 1"
    );
  });
});

describe("endsInsideQuotedField", () => {
  test("tracks quoted fields, ignoring doubled quotes", () => {
    expect(endsInsideQuotedField('"a""b"')).toBe(false);
    expect(endsInsideQuotedField('"open')).toBe(true);
    expect(endsInsideQuotedField('p1,"open')).toBe(true);
  });

  test("treats a quote inside an unquoted field as a literal", () => {
    expect(endsInsideQuotedField('5"cap,ATGC')).toBe(false);
  });
});

describe("splitRows", () => {
  test("skips blank lines and reports 1-based start lines", () => {
    const rows = splitRows("name,sequence\n\np1,AT\r\np2,GC\n");

    expect(rows).toEqual([
      { fields: ["name", "sequence"], lineNumber: 1 },
      { fields: ["p1", "AT"], lineNumber: 3 },
      { fields: ["p2", "GC"], lineNumber: 4 },
    ]);
  });

  test("joins lines inside a quoted field", () => {
    const rows = splitRows('"probe\nwith break",ATGC\np2,GG');

    expect(rows).toEqual([
      { fields: ["probe\nwith break", "ATGC"], lineNumber: 1 },
      { fields: ["p2", "GG"], lineNumber: 3 },
    ]);
  });

  test("does not join lines after a literal quote in an unquoted field", () => {
    expect(splitRows('5"cap,ATGC\np2,GG')).toEqual([
      { fields: ['5"cap', "ATGC"], lineNumber: 1 },
      { fields: ["p2", "GG"], lineNumber: 2 },
    ]);
  });

  test("drops a leading byte order mark", () => {
    expect(splitRows("\uFEFFp1,AT")).toEqual([{ fields: ["p1", "AT"], lineNumber: 1 }]);
  });

  test("throws for a quote left open at end of input", () => {
    expect(() => splitRows('p1,AT\n"p2,GC\n')).toThrow(DSVParseError);
  });

  test("CSVFieldParser uses its configured delimiter", () => {
    const parser = new CSVFieldParser(";");
    expect(parser.splitRows("p1;AT")).toEqual([{ fields: ["p1", "AT"], lineNumber: 1 }]);
    expect(parser.parseRow("a;b")).toEqual(["a", "b"]);
  });
});

describe("DSVRowFormatter", () => {
  test("leaves plain fields alone", () => {
    expect(new DSVRowFormatter().formatRow(["p1", "5′→3′", 1, 4, "ATGC"])).toBe(
      "p1,5′→3′,1,4,ATGC"
    );
  });

  test("quotes fields with delimiters, quotes or line breaks", () => {
    const formatter = new DSVRowFormatter();
    expect(formatter.formatField("a,b")).toBe('"a,b"');
    expect(formatter.formatField('say "hi"')).toBe('"say ""hi"""');
    expect(formatter.formatField("two\nlines")).toBe('"two\nlines"');
  });

  test("renders null and undefined as empty fields", () => {
    expect(new DSVRowFormatter().formatRow([null, "x", undefined])).toBe(",x,");
  });

  test("quoteAll quotes every field", () => {
    expect(new DSVRowFormatter({ quoteAll: true }).formatRow(["a", 1])).toBe('"a","1"');
  });

  test("excelCompatible quotes gene-like names and formulas", () => {
    const formatter = new DSVRowFormatter({ excelCompatible: true });
    expect(formatter.formatField("SEPT1")).toBe('"SEPT1"');
    expect(formatter.formatField("=cmd")).toBe('"=cmd"');
    expect(formatter.formatField("probe1")).toBe("probe1");
  });
});

describe("needsExcelProtection", () => {
  test("flags names Excel would rewrite", () => {
    expect(needsExcelProtection("MARCH1")).toBe(true);
    expect(needsExcelProtection("007")).toBe(true);
    expect(needsExcelProtection("1234567890123456")).toBe(true);
    expect(needsExcelProtection("+AT")).toBe(true);
  });

  test("leaves ordinary values alone", () => {
    expect(needsExcelProtection("BRCA1")).toBe(false);
    expect(needsExcelProtection("12")).toBe(false);
    expect(needsExcelProtection("ATGC")).toBe(false);
  });
});
