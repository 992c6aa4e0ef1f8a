/**
 * Effect platform layer selection
 *
 * All file I/O is described as Effect programs against the platform
 * FileSystem and Path services; this module supplies the Node.js layer and
 * runs programs as Promises that reject with the program's own typed error.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";

/**
 * Effect platform layer providing FileSystem, Path and the other Node services
 */
export function getPlatform() {
  return NodeContext.layer;
}

/**
 * Run a platform program to a Promise.
 *
 * Failures reject with the failure value itself (a FileError, a
 * ValidationError, ...), not with a wrapping fiber failure.
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  const result = await Effect.runPromise(
    Effect.either(program).pipe(Effect.provide(getPlatform()))
  );

  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
