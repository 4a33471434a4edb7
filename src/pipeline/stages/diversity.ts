/**
 * Diversity stage
 *
 * core-metrics-phylogenetic refuses to write into an existing directory,
 * so a previous run's core-metrics/ is removed first. It is the only
 * artifact the pipeline ever deletes.
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../../errors";
import {
  alphaPhylogenetic,
  alphaRarefaction,
  betaPhylogenetic,
  coreMetricsPhylogenetic,
} from "../../tools/qiime";
import type { StageDefinition } from "../context";
import { executeAll, timed } from "../execute";

/**
 * Remove a directory tree if present
 */
export const clearDirectory = (
  path: string
): Effect.Effect<boolean, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const present = yield* fs
      .exists(path)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("stat", path, error)));
    if (!present) {
      return false;
    }
    yield* fs
      .remove(path, { recursive: true })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("remove", path, error)));
    return true;
  });

export const diversityStage: StageDefinition = {
  id: "diversity",
  banner: "Calculating diversity metrics...",
  run: (context) => {
    const { config, layout } = context;
    const { denoising, diversity } = layout;

    return timed(
      "diversity",
      Effect.gen(function* () {
        if (context.dryRun) {
          yield* Effect.logInfo(`[dry-run] remove ${diversity.coreMetrics}`);
        } else if (yield* clearDirectory(diversity.coreMetrics)) {
          yield* Effect.logDebug(`Removed previous ${diversity.coreMetrics}`);
        }

        return yield* executeAll(
          "diversity",
          [
            alphaRarefaction({
              table: denoising.table,
              phylogeny: denoising.rootedTree,
              metadataFile: config.metadataFile,
              minDepth: config.rarefactionMinDepth,
              maxDepth: config.rarefactionMaxDepth,
              visualization: diversity.alphaRarefaction,
            }),
            coreMetricsPhylogenetic({
              table: denoising.table,
              phylogeny: denoising.rootedTree,
              metadataFile: config.metadataFile,
              samplingDepth: config.samplingDepth,
              threads: config.threads,
              outputDir: diversity.coreMetrics,
              expected: [diversity.brayCurtis, diversity.jaccard],
            }),
            alphaPhylogenetic(denoising.rootedTree, denoising.table, "faith_pd", diversity.faithPd),
            betaPhylogenetic(
              denoising.rootedTree,
              denoising.table,
              "weighted_unifrac",
              diversity.weightedUnifrac
            ),
            betaPhylogenetic(
              denoising.rootedTree,
              denoising.table,
              "unweighted_unifrac",
              diversity.unweightedUnifrac
            ),
          ],
          context
        );
      })
    );
  },
};
