/**
 * Sequential execution of a stage's invocations
 */

import { FileSystem } from "@effect/platform";
import { Clock, Effect } from "effect";
import { ArtifactMissingError, FileError, type ToolExecutionError } from "../errors";
import { ToolRunner } from "../tools/runner";
import type { ArtifactRef, StageId, StageResult, ToolInvocation } from "../types";
import type { StageContext, StageRequirements } from "./context";

/**
 * Check that every declared output exists with the declared kind
 */
export const verifyOutputs = (
  stage: StageId,
  outputs: readonly ArtifactRef[]
): Effect.Effect<void, ArtifactMissingError | FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    for (const output of outputs) {
      const present = yield* fs
        .exists(output.path)
        .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", output.path, error)));
      if (!present) {
        return yield* Effect.fail(new ArtifactMissingError(stage, output.path));
      }

      const info = yield* fs
        .stat(output.path)
        .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", output.path, error)));
      const expected = output.kind === "file" ? "File" : "Directory";
      if (info.type !== expected) {
        return yield* Effect.fail(new ArtifactMissingError(stage, output.path));
      }
    }
  });

/**
 * Run one invocation and, when verifying, check its outputs
 */
export const execute = (
  stage: StageId,
  invocation: ToolInvocation,
  verify: boolean
): Effect.Effect<
  ToolInvocation,
  ToolExecutionError | ArtifactMissingError | FileError,
  StageRequirements
> =>
  Effect.gen(function* () {
    const runner = yield* ToolRunner;
    yield* runner.run(invocation, stage);
    if (verify) {
      yield* verifyOutputs(stage, invocation.outputs);
    }
    return invocation;
  });

/**
 * Run invocations strictly one after another; the first failure stops the rest
 */
export const executeAll = (
  stage: StageId,
  invocations: readonly ToolInvocation[],
  context: StageContext
): Effect.Effect<
  ToolInvocation[],
  ToolExecutionError | ArtifactMissingError | FileError,
  StageRequirements
> => Effect.forEach(invocations, (invocation) => execute(stage, invocation, context.verify));

/**
 * Wrap a stage body with its start and completion timestamps
 */
export const timed = <E, R>(
  stage: StageId,
  body: Effect.Effect<readonly ToolInvocation[], E, R>
): Effect.Effect<StageResult, E, R> =>
  Effect.gen(function* () {
    const startedAt = yield* Clock.currentTimeMillis;
    const invocations = yield* body;
    const completedAt = yield* Clock.currentTimeMillis;
    return { stage, invocations, startedAt, completedAt };
  });
