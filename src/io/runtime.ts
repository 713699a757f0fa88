/**
 * Effect platform wiring
 *
 * File I/O is written against the `@effect/platform` FileSystem and Path
 * services; this module supplies the Node.js implementation and runs
 * programs with it.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";

/**
 * Get the Effect platform layer providing FileSystem and Path
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Run a self-contained program and settle with its value
 *
 * Failures reject with the original error value rather than a fiber
 * failure wrapper, so callers can match on the error classes they expect.
 */
export async function runToPromise<A, E>(program: Effect.Effect<A, E>): Promise<A> {
  const exit = await Effect.runPromiseExit(program);
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

/**
 * Run a program that needs platform services
 */
export async function runWithPlatform<A, E>(
  program: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  return runToPromise(program.pipe(Effect.provide(getPlatform())));
}
