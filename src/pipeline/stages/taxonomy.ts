import { classifySklearn, metadataTabulate, taxaBarplot } from "../../tools/qiime";
import type { StageDefinition } from "../context";
import { executeAll, timed } from "../execute";

export const taxonomyStage: StageDefinition = {
  id: "taxonomy",
  banner: "Classifying taxonomy...",
  run: (context) => {
    const { config, layout } = context;
    return timed(
      "taxonomy",
      executeAll(
        "taxonomy",
        [
          classifySklearn(
            layout.denoising.repSeqs,
            config.classifier,
            config.threads,
            layout.taxonomy.artifact
          ),
          metadataTabulate(layout.taxonomy.artifact, layout.taxonomy.visualization),
          taxaBarplot(
            layout.denoising.table,
            layout.taxonomy.artifact,
            config.metadataFile,
            layout.taxonomy.barplot
          ),
        ],
        context
      )
    );
  },
};
