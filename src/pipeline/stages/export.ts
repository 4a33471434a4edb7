import { biomToTsv } from "../../tools/biom";
import { toolsExport } from "../../tools/qiime";
import type { StageDefinition } from "../context";
import { executeAll, timed } from "../execute";

/**
 * Flat exports for analysis outside QIIME 2
 *
 * The BIOM conversion reads the file the feature-table export just
 * wrote, so the two must stay adjacent and in this order.
 */
export const exportStage: StageDefinition = {
  id: "export",
  banner: "Exporting data for downstream analysis...",
  run: (context) => {
    const { denoising, taxonomy, diversity, exports } = context.layout;
    return timed(
      "export",
      executeAll(
        "export",
        [
          toolsExport(denoising.table, exports.featureTable, [exports.featureTableBiom]),
          biomToTsv(exports.featureTableBiom, exports.featureTableTsv),
          toolsExport(taxonomy.artifact, exports.taxonomy),
          toolsExport(diversity.brayCurtis, exports.brayCurtis),
          toolsExport(diversity.weightedUnifrac, exports.weightedUnifrac),
          toolsExport(diversity.jaccard, exports.jaccard),
          toolsExport(diversity.faithPd, exports.faithPd),
        ],
        context
      )
    );
  },
};
