/**
 * File writing operations using Effect Platform
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { Effect } from "effect";
import { FileError, type ValidationError } from "../errors";
import { validateFilePath } from "./file-reader";
import { runWithPlatform } from "./runtime";

/**
 * Write a UTF-8 string, creating missing parent directories and
 * overwriting any existing file
 */
export function writeStringEffect(
  path: string,
  content: string
): Effect.Effect<void, FileError | ValidationError, FileSystem.FileSystem | Path.Path> {
  return Effect.gen(function* () {
    const validPath = yield* validateFilePath(path);
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;

    const directory = pathService.dirname(validPath);
    yield* fs
      .makeDirectory(directory, { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", directory, error)));

    yield* fs
      .writeFileString(validPath, content)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", validPath, error)));
  });
}

/**
 * Write string content to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the directory cannot be created or the write fails
 *
 * @example
 * ```typescript
 * await writeString('results/probe_matches.csv', formatMatchesCSV(matches));
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  return runWithPlatform(writeStringEffect(path, content));
}
