/**
 * Effect-based external tool execution
 *
 * Every external command of a run goes through the ToolRunner service, so
 * the pipeline never spawns a process directly and tests can swap in a
 * recording layer.
 *
 * ## Layers
 *
 * - `ToolRunner.Live(options)` spawns the executable with
 *   `@effect/platform` Command and blocks until it exits. A non-zero exit
 *   status fails with ToolExecutionError; nothing is retried.
 * - `ToolRunner.DryRun(options)` logs the command line and succeeds
 *   without spawning anything.
 *
 * @example
 * ```typescript
 * const program = Effect.gen(function* () {
 *   const runner = yield* ToolRunner;
 *   yield* runner.run(bam2fq("S1.bam", "S1.fastq"), "convert");
 * });
 *
 * await Effect.runPromise(
 *   program.pipe(
 *     Effect.provide(ToolRunner.Live({ workDir: ".", tools })),
 *     Effect.provide(NodeContext.layer)
 *   )
 * );
 * ```
 *
 * @module tools/runner
 */

import { Command, CommandExecutor, FileSystem } from "@effect/platform";
import { Context, Effect, Layer, Sink, Stream } from "effect";
import { FileError, ToolExecutionError } from "../errors";
import type { StageId, ToolInvocation, ToolName } from "../types";
import { formatCommandLine } from "./invocation";

// =============================================================================
// SERVICE SHAPE
// =============================================================================

export interface ToolRunnerShape {
  /**
   * Run one invocation to completion
   *
   * @param invocation - Command to run
   * @param stage - Stage the command belongs to, carried into errors
   * @returns Fails with ToolExecutionError when the tool cannot be started or
   *   exits non-zero, and with FileError when the stdout target cannot be written
   */
  readonly run: (
    invocation: ToolInvocation,
    stage: StageId
  ) => Effect.Effect<void, ToolExecutionError | FileError>;
}

export interface ToolRunnerOptions {
  /** Working directory of every spawned process */
  readonly workDir: string;
  /** Executable name or path per tool */
  readonly tools: Readonly<Record<ToolName, string>>;
}

// =============================================================================
// SERVICE TAG
// =============================================================================

export class ToolRunner extends Context.Tag("@ionflow/ToolRunner")<ToolRunner, ToolRunnerShape>() {
  static readonly Live = (
    options: ToolRunnerOptions
  ): Layer.Layer<ToolRunner, never, CommandExecutor.CommandExecutor | FileSystem.FileSystem> =>
    Layer.effect(
      ToolRunner,
      Effect.gen(function* () {
        const executor = yield* CommandExecutor.CommandExecutor;
        const fs = yield* FileSystem.FileSystem;
        return createLiveRunner(options, executor, fs);
      })
    );

  static readonly DryRun = (options: ToolRunnerOptions): Layer.Layer<ToolRunner> =>
    Layer.succeed(ToolRunner, {
      run: (invocation, stage) =>
        Effect.logInfo(
          `[dry-run] ${formatCommandLine(invocation, options.tools[invocation.tool])}`
        ).pipe(Effect.annotateLogs("stage", stage)),
    });
}

// =============================================================================
// LIVE IMPLEMENTATION
// =============================================================================

function createLiveRunner(
  options: ToolRunnerOptions,
  executor: CommandExecutor.CommandExecutor,
  fs: FileSystem.FileSystem
): ToolRunnerShape {
  return {
    run: (invocation, stage) => {
      const executable = options.tools[invocation.tool];
      const spawnFailure = (error: unknown): ToolExecutionError =>
        ToolExecutionError.forSpawnFailure(executable, invocation.args, stage, error);
      const command = Command.make(executable, ...invocation.args).pipe(
        Command.workingDirectory(options.workDir),
        Command.stderr("inherit")
      );
      const stdoutPath = invocation.stdoutPath;

      // stdout is either shown to the user or streamed into the redirect target
      const exitCode =
        stdoutPath === undefined
          ? Command.exitCode(command.pipe(Command.stdout("inherit"))).pipe(
              Effect.mapError(spawnFailure)
            )
          : Effect.scoped(
              Effect.gen(function* () {
                const child = yield* Command.start(command).pipe(Effect.mapError(spawnFailure));
                const target = fs
                  .sink(stdoutPath)
                  .pipe(
                    Sink.mapError((error) => FileError.fromSystemError("write", stdoutPath, error))
                  );
                yield* child.stdout.pipe(Stream.mapError(spawnFailure), Stream.run(target));
                return yield* child.exitCode.pipe(Effect.mapError(spawnFailure));
              })
            );

      return Effect.logDebug(formatCommandLine(invocation, executable)).pipe(
        Effect.zipRight(exitCode),
        Effect.provideService(CommandExecutor.CommandExecutor, executor),
        Effect.flatMap((code) =>
          code === 0
            ? Effect.void
            : Effect.fail(
                ToolExecutionError.forExitCode(executable, invocation.args, stage, Number(code))
              )
        ),
        Effect.annotateLogs("stage", stage)
      );
    },
  };
}
