import { Effect } from "effect";
import {
  denoisePyro,
  featureTableSummarize,
  metadataTabulate,
  tabulateSeqs,
} from "../../tools/qiime";
import type { StageDefinition } from "../context";
import { executeAll, timed } from "../execute";

export const denoiseStage: StageDefinition = {
  id: "denoise",
  banner: "Denoising sequences with DADA2...",
  run: (context) => {
    const { config, layout } = context;
    const { denoising } = layout;

    return timed(
      "denoise",
      Effect.gen(function* () {
        const invocations = yield* executeAll(
          "denoise",
          [
            denoisePyro({
              demux: layout.demux.artifact,
              truncLen: config.truncLen,
              truncQ: config.truncQ,
              trimLeft: config.trimLeft,
              threads: config.threads,
              table: denoising.table,
              repSeqs: denoising.repSeqs,
              stats: denoising.stats,
            }),
            featureTableSummarize(denoising.table, config.metadataFile, denoising.tableSummary),
            tabulateSeqs(denoising.repSeqs, denoising.repSeqsVisualization),
            metadataTabulate(denoising.stats, denoising.statsVisualization),
          ],
          context
        );
        yield* Effect.logDebug(`Feature table written to ${denoising.table}`);
        return invocations;
      })
    );
  },
};
