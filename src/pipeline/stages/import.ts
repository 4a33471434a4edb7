import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError, ManifestError } from "../../errors";
import { checkSampleCoverage, parseManifest, parseMetadata } from "../../formats/manifest";
import { demuxSummarize, toolsImport } from "../../tools/qiime";
import type { ManifestEntry, SampleMetadata } from "../../types";
import type { StageContext, StageDefinition } from "../context";
import { executeAll, timed } from "../execute";

const readText = (path: string): Effect.Effect<string, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs
      .readFileString(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("read", path, error)));
  });

const parseWith = <A>(parse: () => A): Effect.Effect<A, ManifestError> =>
  Effect.try({
    try: parse,
    catch: (error) =>
      error instanceof ManifestError
        ? error
        : new ManifestError(error instanceof Error ? error.message : String(error), "preflight"),
  });

export interface PreflightResult {
  readonly manifest: readonly ManifestEntry[];
  readonly metadata: SampleMetadata;
}

/**
 * Parse manifest and metadata and check that every sample is annotated
 *
 * Runs before the first QIIME 2 invocation.
 */
export const preflight = (
  context: StageContext
): Effect.Effect<PreflightResult, ManifestError | FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const { manifestFile, metadataFile } = context.config;

    const manifestText = yield* readText(manifestFile);
    const manifest = yield* parseWith(() => parseManifest(manifestText, manifestFile));

    const metadataText = yield* readText(metadataFile);
    const metadata = yield* parseWith(() => parseMetadata(metadataText, metadataFile));

    yield* parseWith(() => checkSampleCoverage(manifest, metadata, metadataFile));
    yield* Effect.logDebug(
      `Manifest lists ${manifest.length} sample(s); metadata has ${metadata.columns.length} column(s)`
    );
    return { manifest, metadata };
  });

export const importStage: StageDefinition = {
  id: "import",
  banner: "Importing sequences into QIIME2...",
  run: (context) =>
    timed(
      "import",
      Effect.gen(function* () {
        yield* preflight(context);

        const { layout } = context;
        const invocations = yield* executeAll(
          "import",
          [
            toolsImport(context.config.manifestFile, layout.demux.artifact),
            demuxSummarize(layout.demux.artifact, layout.demux.visualization),
          ],
          context
        );
        yield* Effect.logInfo(`View quality plots: qiime tools view ${layout.demux.visualization}`);
        return invocations;
      })
    ),
};
