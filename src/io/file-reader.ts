/**
 * File reading through the Effect platform FileSystem service
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { FileError, ValidationError } from "../errors";
import { FilePathSchema } from "../types";
import { runWithPlatform } from "./runtime";

/**
 * Largest probe table or sequence file read in one go (100MB)
 */
export const DEFAULT_MAX_FILE_SIZE = 104_857_600;

export interface ReadTextOptions {
  readonly maxFileSize?: number;
}

/**
 * Check a path against FilePathSchema
 */
export function validateFilePath(path: string): Effect.Effect<string, ValidationError> {
  const result = FilePathSchema(path);
  if (result instanceof type.errors) {
    return Effect.fail(new ValidationError(`Invalid file path: ${result.summary}`));
  }
  return Effect.succeed(result);
}

/**
 * Read a whole UTF-8 text file
 */
export function readTextFileEffect(
  path: string,
  options: ReadTextOptions = {}
): Effect.Effect<string, FileError | ValidationError, FileSystem.FileSystem> {
  const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;

  return Effect.gen(function* () {
    const validPath = yield* validateFilePath(path);
    const fs = yield* FileSystem.FileSystem;

    const info = yield* fs
      .stat(validPath)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", validPath, error)));

    if (info.size > BigInt(maxFileSize)) {
      return yield* Effect.fail(
        new FileError(
          `File size ${info.size} exceeds maximum ${maxFileSize}`,
          validPath,
          "read",
          undefined,
          "Split the input or raise maxFileSize"
        )
      );
    }

    return yield* fs
      .readFileString(validPath)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", validPath, error)));
  });
}

/**
 * Read a whole UTF-8 text file
 *
 * @throws {FileError} When the file is missing, unreadable or too large
 * @throws {ValidationError} When the path is malformed
 */
export async function readTextFile(path: string, options: ReadTextOptions = {}): Promise<string> {
  return runWithPlatform(readTextFileEffect(path, options));
}
