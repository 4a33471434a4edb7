import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { NodeContext } from "@effect/platform-node";
import { Effect, Layer, Logger, LogLevel } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ERROR_SUGGESTIONS, FileError, getErrorSuggestion, ToolExecutionError } from "../../src/errors";
import { ToolRunner, type ToolRunnerOptions } from "../../src/tools/runner";
import type { ToolInvocation } from "../../src/types";

// Every tool name points at the Node binary so `-e` scripts stand in for real tools
const nodeTools = (workDir: string): ToolRunnerOptions => ({
  workDir,
  tools: { qiime: process.execPath, samtools: process.execPath, biom: process.execPath },
});

const script = (code: string, stdoutPath?: string): ToolInvocation => ({
  tool: "samtools",
  args: ["-e", code],
  ...(stdoutPath !== undefined && { stdoutPath }),
  outputs: [],
});

describe("ToolRunner.Live", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ionflow-runner-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const run = (invocation: ToolInvocation, options: ToolRunnerOptions = nodeTools(dir)) =>
    Effect.gen(function* () {
      const runner = yield* ToolRunner;
      yield* runner.run(invocation, "convert");
    }).pipe(
      Effect.provide(ToolRunner.Live(options)),
      Effect.provide(Layer.merge(NodeContext.layer, Logger.minimumLogLevel(LogLevel.None)))
    );

  test("streams stdout into the redirect target", async () => {
    const target = join(dir, "S1.fastq");
    await Effect.runPromise(run(script("process.stdout.write('@r1\\nACGT\\n')", target)));
    expect(readFileSync(target, "utf8")).toBe("@r1\nACGT\n");
  });

  test("runs in the configured working directory", async () => {
    await Effect.runPromise(run(script("require('fs').writeFileSync('marker.txt', 'here')")));
    expect(readFileSync(join(dir, "marker.txt"), "utf8")).toBe("here");
  });

  test("fails with the exit status of the tool", async () => {
    const error = await Effect.runPromise(Effect.flip(run(script("process.exit(3)"))));

    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error instanceof ToolExecutionError && error.exitCode).toBe(3);
    expect(error instanceof ToolExecutionError && error.stage).toBe("convert");
    expect(error.message).toBe(`${process.execPath} exited with status 3 during stage "convert"`);
  });

  test("fails without an exit status when the tool cannot be started", async () => {
    const options: ToolRunnerOptions = {
      workDir: dir,
      tools: {
        qiime: join(dir, "no-such-tool"),
        samtools: join(dir, "no-such-tool"),
        biom: join(dir, "no-such-tool"),
      },
    };
    const error = await Effect.runPromise(Effect.flip(run(script("0"), options)));

    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error instanceof ToolExecutionError && error.exitCode).toBeUndefined();
    expect(
      error.message.startsWith(`Could not run ${join(dir, "no-such-tool")} during stage "convert": `)
    ).toBe(true);
    expect(error.message).not.toContain("[object Object]");
  });

  test("reports an unwritable stdout target as a file error", async () => {
    const target = join(dir, "nodir", "S1.fastq");
    const error = await Effect.runPromise(
      Effect.flip(run(script("process.stdout.write('@r1\\n')", target)))
    );

    expect(error).toBeInstanceOf(FileError);
    expect(error instanceof FileError && error.operation).toBe("write");
    expect(error instanceof FileError && error.filePath).toBe(target);
    expect(error.message.startsWith(`write failed for ${target}: NotFound: `)).toBe(true);
    expect(getErrorSuggestion(error)).toBe(ERROR_SUGGESTIONS.FILE);
  });
});

describe("ToolRunner.DryRun", () => {
  test("succeeds without spawning anything", async () => {
    const dir = mkdtempSync(join(tmpdir(), "ionflow-dry-"));
    try {
      const target = join(dir, "never.fastq");
      await Effect.runPromise(
        Effect.gen(function* () {
          const runner = yield* ToolRunner;
          yield* runner.run(script("process.exit(1)", target), "convert");
        }).pipe(
          Effect.provide(ToolRunner.DryRun(nodeTools(dir))),
          Effect.provide(Logger.minimumLogLevel(LogLevel.None))
        )
      );
      expect(existsSync(target)).toBe(false);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
