/**
 * QIIME 2 command builders
 *
 * One builder per subcommand the pipeline uses. Builders are pure: they
 * only turn paths and parameters into an argv array plus the outputs the
 * command is expected to write.
 */

import type { ArtifactRef, ToolInvocation } from "../types";
import { directory, file } from "./invocation";

function qiime(args: string[], outputs: ArtifactRef[]): ToolInvocation {
  return { tool: "qiime", args, outputs };
}

// =============================================================================
// IMPORT
// =============================================================================

export const IMPORT_TYPE = "SampleData[SequencesWithQuality]";
export const IMPORT_FORMAT = "SingleEndFastqManifestPhred33V2";

export function toolsImport(manifestPath: string, outputPath: string): ToolInvocation {
  return qiime(
    [
      "tools",
      "import",
      "--type",
      IMPORT_TYPE,
      "--input-path",
      manifestPath,
      "--output-path",
      outputPath,
      "--input-format",
      IMPORT_FORMAT,
    ],
    [file(outputPath)]
  );
}

export function demuxSummarize(data: string, visualization: string): ToolInvocation {
  return qiime(
    ["demux", "summarize", "--i-data", data, "--o-visualization", visualization],
    [file(visualization)]
  );
}

// =============================================================================
// DENOISING
// =============================================================================

export interface DenoisePyroOptions {
  readonly demux: string;
  readonly truncLen: number;
  readonly truncQ: number;
  readonly trimLeft: number;
  readonly threads: number;
  readonly table: string;
  readonly repSeqs: string;
  readonly stats: string;
}

/**
 * DADA2 in pyrosequencing mode, which models the homopolymer errors of Ion Torrent reads
 */
export function denoisePyro(options: DenoisePyroOptions): ToolInvocation {
  return qiime(
    [
      "dada2",
      "denoise-pyro",
      "--i-demultiplexed-seqs",
      options.demux,
      "--p-trunc-len",
      String(options.truncLen),
      "--p-trunc-q",
      String(options.truncQ),
      "--p-trim-left",
      String(options.trimLeft),
      "--p-n-threads",
      String(options.threads),
      "--o-table",
      options.table,
      "--o-representative-sequences",
      options.repSeqs,
      "--o-denoising-stats",
      options.stats,
      "--verbose",
    ],
    [file(options.table), file(options.repSeqs), file(options.stats)]
  );
}

export function featureTableSummarize(
  table: string,
  metadataFile: string,
  visualization: string
): ToolInvocation {
  return qiime(
    [
      "feature-table",
      "summarize",
      "--i-table",
      table,
      "--m-sample-metadata-file",
      metadataFile,
      "--o-visualization",
      visualization,
    ],
    [file(visualization)]
  );
}

export function tabulateSeqs(data: string, visualization: string): ToolInvocation {
  return qiime(
    ["feature-table", "tabulate-seqs", "--i-data", data, "--o-visualization", visualization],
    [file(visualization)]
  );
}

export function metadataTabulate(input: string, visualization: string): ToolInvocation {
  return qiime(
    ["metadata", "tabulate", "--m-input-file", input, "--o-visualization", visualization],
    [file(visualization)]
  );
}

// =============================================================================
// TAXONOMY
// =============================================================================

export function classifySklearn(
  reads: string,
  classifier: string,
  threads: number,
  classification: string
): ToolInvocation {
  return qiime(
    [
      "feature-classifier",
      "classify-sklearn",
      "--i-reads",
      reads,
      "--i-classifier",
      classifier,
      "--p-n-jobs",
      String(threads),
      "--o-classification",
      classification,
    ],
    [file(classification)]
  );
}

export function taxaBarplot(
  table: string,
  taxonomy: string,
  metadataFile: string,
  visualization: string
): ToolInvocation {
  return qiime(
    [
      "taxa",
      "barplot",
      "--i-table",
      table,
      "--i-taxonomy",
      taxonomy,
      "--m-metadata-file",
      metadataFile,
      "--o-visualization",
      visualization,
    ],
    [file(visualization)]
  );
}

// =============================================================================
// PHYLOGENY
// =============================================================================

export function alignMafft(sequences: string, threads: number, alignment: string): ToolInvocation {
  return qiime(
    [
      "alignment",
      "mafft",
      "--i-sequences",
      sequences,
      "--p-n-threads",
      String(threads),
      "--o-alignment",
      alignment,
    ],
    [file(alignment)]
  );
}

export function alignMask(alignment: string, masked: string): ToolInvocation {
  return qiime(
    ["alignment", "mask", "--i-alignment", alignment, "--o-masked-alignment", masked],
    [file(masked)]
  );
}

export function fasttree(alignment: string, threads: number, tree: string): ToolInvocation {
  return qiime(
    [
      "phylogeny",
      "fasttree",
      "--i-alignment",
      alignment,
      "--p-n-threads",
      String(threads),
      "--o-tree",
      tree,
    ],
    [file(tree)]
  );
}

export function midpointRoot(tree: string, rooted: string): ToolInvocation {
  return qiime(
    ["phylogeny", "midpoint-root", "--i-tree", tree, "--o-rooted-tree", rooted],
    [file(rooted)]
  );
}

// =============================================================================
// DIVERSITY
// =============================================================================

export interface AlphaRarefactionOptions {
  readonly table: string;
  readonly phylogeny: string;
  readonly metadataFile: string;
  readonly minDepth: number;
  readonly maxDepth: number;
  readonly visualization: string;
}

export function alphaRarefaction(options: AlphaRarefactionOptions): ToolInvocation {
  return qiime(
    [
      "diversity",
      "alpha-rarefaction",
      "--i-table",
      options.table,
      "--i-phylogeny",
      options.phylogeny,
      "--m-metadata-file",
      options.metadataFile,
      "--p-min-depth",
      String(options.minDepth),
      "--p-max-depth",
      String(options.maxDepth),
      "--o-visualization",
      options.visualization,
    ],
    [file(options.visualization)]
  );
}

export interface CoreMetricsOptions {
  readonly table: string;
  readonly phylogeny: string;
  readonly metadataFile: string;
  readonly samplingDepth: number;
  readonly threads: number;
  readonly outputDir: string;
  /** Matrices later stages read from the output directory */
  readonly expected: readonly string[];
}

export function coreMetricsPhylogenetic(options: CoreMetricsOptions): ToolInvocation {
  return qiime(
    [
      "diversity",
      "core-metrics-phylogenetic",
      "--i-table",
      options.table,
      "--i-phylogeny",
      options.phylogeny,
      "--m-metadata-file",
      options.metadataFile,
      "--p-sampling-depth",
      String(options.samplingDepth),
      "--p-n-jobs-or-threads",
      String(options.threads),
      "--output-dir",
      options.outputDir,
    ],
    [directory(options.outputDir), ...options.expected.map(file)]
  );
}

export function alphaPhylogenetic(
  phylogeny: string,
  table: string,
  metric: "faith_pd",
  alphaDiversity: string
): ToolInvocation {
  return qiime(
    [
      "diversity",
      "alpha-phylogenetic",
      "--i-phylogeny",
      phylogeny,
      "--i-table",
      table,
      "--p-metric",
      metric,
      "--o-alpha-diversity",
      alphaDiversity,
    ],
    [file(alphaDiversity)]
  );
}

export function betaPhylogenetic(
  phylogeny: string,
  table: string,
  metric: "weighted_unifrac" | "unweighted_unifrac",
  distanceMatrix: string
): ToolInvocation {
  return qiime(
    [
      "diversity",
      "beta-phylogenetic",
      "--i-phylogeny",
      phylogeny,
      "--i-table",
      table,
      "--p-metric",
      metric,
      "--o-distance-matrix",
      distanceMatrix,
    ],
    [file(distanceMatrix)]
  );
}

// =============================================================================
// EXPORT
// =============================================================================

/**
 * `qiime tools export`; the output is a directory
 *
 * @param expected - Files inside the directory that later steps read
 */
export function toolsExport(
  inputPath: string,
  outputPath: string,
  expected: readonly string[] = []
): ToolInvocation {
  return qiime(
    ["tools", "export", "--input-path", inputPath, "--output-path", outputPath],
    [directory(outputPath), ...expected.map(file)]
  );
}
