/**
 * Tests for platform file reading and writing
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError, ValidationError } from "../../src/errors";
import { readTextFile } from "../../src/io/file-reader";
import { writeString } from "../../src/io/file-writer";

let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), "probe-locator-io-"));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe("readTextFile", () => {
  test("reads a UTF-8 file", async () => {
    const path = join(workDir, "probes.csv");
    writeFileSync(path, "name,sequence\np1,ATGC\n");

    await expect(readTextFile(path)).resolves.toBe("name,sequence\np1,ATGC\n");
  });

  test("rejects with FileError for a missing file", async () => {
    const path = join(workDir, "missing.csv");

    const error = await readTextFile(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FileError);
    expect(error).toMatchObject({ filePath: path, operation: "stat" });
  });

  test("rejects files over maxFileSize", async () => {
    const path = join(workDir, "big.txt");
    writeFileSync(path, "ATGCATGCAT");

    await expect(readTextFile(path, { maxFileSize: 4 })).rejects.toThrow(
      "File size 10 exceeds maximum 4"
    );
  });

  test("rejects an empty path with ValidationError", async () => {
    await expect(readTextFile("")).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("writeString", () => {
  test("creates missing directories and overwrites existing content", async () => {
    const path = join(workDir, "nested", "out", "matches.csv");

    await writeString(path, "first");
    await writeString(path, "second");

    expect(readFileSync(path, "utf8")).toBe("second");
    await expect(readTextFile(path)).resolves.toBe("second");
  });

  test("rejects a path containing a NUL byte", async () => {
    await expect(writeString(join(workDir, "bad\0name"), "x")).rejects.toBeInstanceOf(
      ValidationError
    );
  });
});
