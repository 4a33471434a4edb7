import { alignMafft, alignMask, fasttree, midpointRoot } from "../../tools/qiime";
import type { StageDefinition } from "../context";
import { executeAll, timed } from "../execute";

// align -> mask -> unrooted tree -> midpoint root
export const phylogenyStage: StageDefinition = {
  id: "phylogeny",
  banner: "Building phylogenetic tree...",
  run: (context) => {
    const { threads } = context.config;
    const d = context.layout.denoising;
    return timed(
      "phylogeny",
      executeAll(
        "phylogeny",
        [
          alignMafft(d.repSeqs, threads, d.alignedRepSeqs),
          alignMask(d.alignedRepSeqs, d.maskedAlignedRepSeqs),
          fasttree(d.maskedAlignedRepSeqs, threads, d.unrootedTree),
          midpointRoot(d.unrootedTree, d.rootedTree),
        ],
        context
      )
    );
  },
};
