/**
 * Command-line entry point
 *
 * ```
 * ionflow [--config run.json] [--work-dir d] [--output-dir d] [--threads n]
 *         [--sampling-depth n] [--classifier p] [--dry-run] [--verbose]
 * ```
 *
 * Exit status: 0 on success, 1 when the run fails, 2 on a usage error.
 */

import type { CommandExecutor, FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Layer, Logger, LogLevel, Option } from "effect";
import { parseArgs } from "util";
import { type PipelineConfigInput, loadConfigFile, resolveConfig } from "./config";
import { ConfigError, getErrorSuggestion } from "./errors";
import { runPipeline } from "./pipeline";
import { ToolRunner } from "./tools/runner";

export const USAGE = `Usage: ionflow [options]

Run the Ion Torrent 16S pipeline in the working directory.

Options:
  --config <file>         JSON configuration file
  --work-dir <dir>        Directory with archives, manifest and metadata
  --output-dir <dir>      Output root (default: ./results)
  --threads <n>           Threads for every tool that takes them
  --sampling-depth <n>    Rarefaction depth for core diversity metrics
  --classifier <path>     Pre-trained taxonomy classifier (.qza)
  --dry-run               Log the commands without running them
  --verbose               Log every command line
  -h, --help              Show this help
`;

/**
 * Malformed command line; reported with the usage text
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliOptions {
  readonly configFile?: string;
  readonly overrides: PipelineConfigInput;
  readonly verbose: boolean;
  readonly help: boolean;
}

function parseCount(flag: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`--${flag} expects a non-negative integer, got "${value}"`);
  }
  return Number(value);
}

const parseRaw = (argv: readonly string[]) => {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        config: { type: "string" },
        "work-dir": { type: "string" },
        "output-dir": { type: "string" },
        threads: { type: "string" },
        "sampling-depth": { type: "string" },
        classifier: { type: "string" },
        "dry-run": { type: "boolean" },
        verbose: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
      allowPositionals: false,
      strict: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
};

/**
 * Turn argv into options and configuration overrides
 *
 * @throws {UsageError} for unknown flags, missing values or positionals
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values } = parseRaw(argv);
  const overrides: PipelineConfigInput = {};
  if (values["work-dir"] !== undefined) overrides.workDir = values["work-dir"];
  if (values["output-dir"] !== undefined) overrides.outputDir = values["output-dir"];
  if (values.threads !== undefined) overrides.threads = parseCount("threads", values.threads);
  if (values["sampling-depth"] !== undefined) {
    overrides.samplingDepth = parseCount("sampling-depth", values["sampling-depth"]);
  }
  if (values.classifier !== undefined) overrides.classifier = values.classifier;
  if (values["dry-run"] === true) overrides.dryRun = true;

  return {
    ...(values.config !== undefined && { configFile: values.config }),
    overrides,
    verbose: values.verbose === true,
    help: values.help === true,
  };
}

/**
 * Resolve the configuration and run the pipeline with the matching runner
 *
 * Command-line overrides win over the configuration file.
 */
export const runCli = (options: CliOptions) =>
  Effect.gen(function* () {
    const fromFile =
      options.configFile === undefined ? {} : yield* loadConfigFile(options.configFile);

    const config = yield* Effect.try({
      try: () => resolveConfig({ ...fromFile, ...options.overrides }),
      catch: (error) =>
        error instanceof ConfigError
          ? error
          : new ConfigError(error instanceof Error ? error.message : String(error)),
    });

    const runnerOptions = { workDir: config.workDir, tools: config.tools };
    const runner: Layer.Layer<
      ToolRunner,
      never,
      CommandExecutor.CommandExecutor | FileSystem.FileSystem
    > = config.dryRun
      ? ToolRunner.DryRun(runnerOptions)
      : ToolRunner.Live(runnerOptions);

    return yield* runPipeline(config).pipe(Effect.provide(runner));
  });

/**
 * Run the CLI and return the process exit status
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const exit = await Effect.runPromiseExit(
    runCli(options).pipe(
      Effect.provide(NodeContext.layer),
      Effect.provide(Logger.pretty),
      Effect.provide(Logger.minimumLogLevel(options.verbose ? LogLevel.Debug : LogLevel.Info))
    )
  );

  if (Exit.isSuccess(exit)) {
    return 0;
  }

  const failure = Cause.failureOption(exit.cause);
  if (Option.isSome(failure)) {
    console.error(`Error: ${failure.value.message}`);
    console.error(`Suggestion: ${getErrorSuggestion(failure.value)}`);
  } else {
    console.error(Cause.pretty(exit.cause));
  }
  return 1;
}
