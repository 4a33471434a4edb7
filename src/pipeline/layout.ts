/**
 * Fixed output tree of a run
 *
 * Every artifact lives at a path derived from the output root alone, so
 * each stage can find its inputs without asking the previous one.
 */

import { join } from "path";

/**
 * Subdirectories created by the setup stage
 */
export const OUTPUT_SUBDIRECTORIES = ["denoising", "taxonomy", "diversity", "exports"] as const;

export interface OutputLayout {
  readonly root: string;
  readonly dirs: Readonly<Record<(typeof OUTPUT_SUBDIRECTORIES)[number], string>>;
  readonly demux: { readonly artifact: string; readonly visualization: string };
  readonly denoising: {
    readonly table: string;
    readonly repSeqs: string;
    readonly stats: string;
    readonly tableSummary: string;
    readonly repSeqsVisualization: string;
    readonly statsVisualization: string;
    readonly alignedRepSeqs: string;
    readonly maskedAlignedRepSeqs: string;
    readonly unrootedTree: string;
    readonly rootedTree: string;
  };
  readonly taxonomy: {
    readonly artifact: string;
    readonly visualization: string;
    readonly barplot: string;
  };
  readonly diversity: {
    readonly alphaRarefaction: string;
    readonly coreMetrics: string;
    readonly brayCurtis: string;
    readonly jaccard: string;
    readonly faithPd: string;
    readonly weightedUnifrac: string;
    readonly unweightedUnifrac: string;
  };
  readonly exports: {
    readonly featureTable: string;
    readonly featureTableBiom: string;
    readonly featureTableTsv: string;
    readonly taxonomy: string;
    readonly brayCurtis: string;
    readonly weightedUnifrac: string;
    readonly jaccard: string;
    readonly faithPd: string;
  };
  readonly report: string;
}

export function createLayout(root: string): OutputLayout {
  const denoising = join(root, "denoising");
  const taxonomy = join(root, "taxonomy");
  const diversity = join(root, "diversity");
  const exports = join(root, "exports");
  const coreMetrics = join(diversity, "core-metrics");
  const featureTableExport = join(exports, "feature-table");

  return {
    root,
    dirs: { denoising, taxonomy, diversity, exports },
    demux: {
      artifact: join(root, "demux-seqs.qza"),
      visualization: join(root, "demux-seqs.qzv"),
    },
    denoising: {
      table: join(denoising, "feature-table.qza"),
      repSeqs: join(denoising, "rep-seqs.qza"),
      stats: join(denoising, "stats.qza"),
      tableSummary: join(denoising, "feature-table-summary.qzv"),
      repSeqsVisualization: join(denoising, "rep-seqs.qzv"),
      statsVisualization: join(denoising, "stats.qzv"),
      alignedRepSeqs: join(denoising, "aligned-rep-seqs.qza"),
      maskedAlignedRepSeqs: join(denoising, "masked-aligned-rep-seqs.qza"),
      unrootedTree: join(denoising, "unrooted-tree.qza"),
      rootedTree: join(denoising, "rooted-tree.qza"),
    },
    taxonomy: {
      artifact: join(taxonomy, "taxonomy.qza"),
      visualization: join(taxonomy, "taxonomy.qzv"),
      barplot: join(taxonomy, "taxa-barplot.qzv"),
    },
    diversity: {
      alphaRarefaction: join(diversity, "alpha-rarefaction.qzv"),
      coreMetrics,
      brayCurtis: join(coreMetrics, "bray_curtis_distance_matrix.qza"),
      jaccard: join(coreMetrics, "jaccard_distance_matrix.qza"),
      faithPd: join(diversity, "faith-pd.qza"),
      weightedUnifrac: join(diversity, "weighted-unifrac.qza"),
      unweightedUnifrac: join(diversity, "unweighted-unifrac.qza"),
    },
    exports: {
      featureTable: featureTableExport,
      featureTableBiom: join(featureTableExport, "feature-table.biom"),
      featureTableTsv: join(featureTableExport, "feature-table.tsv"),
      taxonomy: join(exports, "taxonomy"),
      brayCurtis: join(exports, "bray-curtis"),
      weightedUnifrac: join(exports, "weighted-unifrac"),
      jaccard: join(exports, "jaccard"),
      faithPd: join(exports, "faith-pd"),
    },
    report: join(root, "pipeline-report.json"),
  };
}
