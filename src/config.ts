/**
 * Pipeline configuration
 *
 * A run is fully described by one PipelineConfig. Values come from the
 * defaults below, then an optional JSON file, then CLI overrides; the
 * merged object is validated once and its paths resolved against workDir.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { isAbsolute, resolve } from "path";
import { ConfigError, FileError } from "./errors";

const ToolPathsSchema = type({
  qiime: "string>0",
  samtools: "string>0",
  biom: "string>0",
});

/**
 * ArkType schema for a complete configuration
 */
export const PipelineConfigSchema = type({
  workDir: "string>0",
  outputDir: "string>0",
  manifestFile: "string>0",
  metadataFile: "string>0",
  // DADA2 denoise-pyro
  trimLeft: "number.integer>=0",
  truncLen: "number.integer>=0",
  truncQ: "number.integer>=0",
  // Diversity
  samplingDepth: "number.integer>=1",
  rarefactionMinDepth: "number.integer>=1",
  rarefactionMaxDepth: "number.integer>=1",
  classifier: "string>0",
  threads: "number.integer>=1",
  verifyOutputs: "boolean",
  dryRun: "boolean",
  tools: ToolPathsSchema,
}).narrow((config, ctx) => {
  if (config.rarefactionMaxDepth <= config.rarefactionMinDepth) {
    return ctx.reject({
      path: ["rarefactionMaxDepth"],
      expected: `greater than rarefactionMinDepth (${config.rarefactionMinDepth})`,
      actual: String(config.rarefactionMaxDepth),
    });
  }
  return true;
});

export type PipelineConfig = typeof PipelineConfigSchema.infer;

/**
 * Partial configuration as read from a JSON file or the command line
 */
export const PipelineConfigInputSchema = type({
  "workDir?": "string",
  "outputDir?": "string",
  "manifestFile?": "string",
  "metadataFile?": "string",
  "trimLeft?": "number",
  "truncLen?": "number",
  "truncQ?": "number",
  "samplingDepth?": "number",
  "rarefactionMinDepth?": "number",
  "rarefactionMaxDepth?": "number",
  "classifier?": "string",
  "threads?": "number",
  "verifyOutputs?": "boolean",
  "dryRun?": "boolean",
  "tools?": {
    "qiime?": "string",
    "samtools?": "string",
    "biom?": "string",
  },
});

export type PipelineConfigInput = typeof PipelineConfigInputSchema.infer;

export const DEFAULT_CONFIG: PipelineConfig = {
  workDir: ".",
  outputDir: "./results",
  manifestFile: "manifest.tsv",
  metadataFile: "metadata.tsv",
  trimLeft: 15,
  truncLen: 0, // no truncation, recommended for Ion Torrent
  truncQ: 20,
  samplingDepth: 3400,
  rarefactionMinDepth: 10,
  rarefactionMaxDepth: 5000,
  classifier: "path/to/gg-13-8-99-515-806-nb-classifier.qza",
  threads: 4,
  verifyOutputs: true,
  dryRun: false,
  tools: {
    qiime: "qiime",
    samtools: "samtools",
    biom: "biom",
  },
};

const KNOWN_KEYS = new Set(Object.keys(DEFAULT_CONFIG));

/**
 * Merge overrides onto defaults, validate, and make every path absolute
 *
 * workDir resolves against the process cwd; all other paths resolve
 * against workDir.
 *
 * @throws {ConfigError} for unknown keys or invalid values
 */
export function resolveConfig(
  overrides: PipelineConfigInput = {},
  cwd: string = process.cwd()
): PipelineConfig {
  for (const key of Object.keys(overrides)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new ConfigError("Unknown configuration key", key);
    }
  }

  const merged = {
    ...DEFAULT_CONFIG,
    ...overrides,
    tools: { ...DEFAULT_CONFIG.tools, ...overrides.tools },
  };

  const validation = PipelineConfigSchema(merged);
  if (validation instanceof type.errors) {
    throw new ConfigError(`Invalid configuration: ${validation.summary}`);
  }

  const workDir = resolve(cwd, validation.workDir);
  const within = (path: string): string => (isAbsolute(path) ? path : resolve(workDir, path));

  return {
    ...validation,
    workDir,
    outputDir: within(validation.outputDir),
    manifestFile: within(validation.manifestFile),
    metadataFile: within(validation.metadataFile),
    classifier: within(validation.classifier),
  };
}

/**
 * Read a JSON configuration file
 *
 * The result is still partial; pass it through resolveConfig.
 */
export const loadConfigFile = (
  path: string
): Effect.Effect<PipelineConfigInput, ConfigError | FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const text = yield* fs
      .readFileString(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)));

    const raw = yield* Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (error) =>
        new ConfigError(
          `Malformed JSON in ${path}: ${error instanceof Error ? error.message : String(error)}`
        ),
    });

    const validation = PipelineConfigInputSchema(raw);
    if (validation instanceof type.errors) {
      return yield* Effect.fail(
        new ConfigError(`Invalid configuration in ${path}: ${validation.summary}`)
      );
    }
    return validation;
  });
