import { existsSync, readFileSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { Effect } from "effect";
import { strToU8, zipSync } from "fflate";
import { afterEach, describe, expect, test } from "vitest";
import { type PipelineConfigInput, resolveConfig } from "../../src/config";
import { ArtifactMissingError, FileError, ManifestError, ToolExecutionError } from "../../src/errors";
import { runPipeline } from "../../src/pipeline";
import { createLayout } from "../../src/pipeline/layout";
import { threadArgument } from "../../src/tools/invocation";
import { STAGE_ORDER } from "../../src/types";
import { createRecordingRunner, type RecordingOptions, QuietNodeContext } from "../utils/runner-layers";
import { createWorkspace } from "../utils/workspace";

const EXPECTED_COMMANDS = [
  "qiime tools import",
  "qiime demux summarize",
  "qiime dada2 denoise-pyro",
  "qiime feature-table summarize",
  "qiime feature-table tabulate-seqs",
  "qiime metadata tabulate",
  "qiime feature-classifier classify-sklearn",
  "qiime metadata tabulate",
  "qiime taxa barplot",
  "qiime alignment mafft",
  "qiime alignment mask",
  "qiime phylogeny fasttree",
  "qiime phylogeny midpoint-root",
  "qiime diversity alpha-rarefaction",
  "qiime diversity core-metrics-phylogenetic",
  "qiime diversity alpha-phylogenetic",
  "qiime diversity beta-phylogenetic",
  "qiime diversity beta-phylogenetic",
  "qiime tools export",
  "biom convert -i",
  "qiime tools export",
  "qiime tools export",
  "qiime tools export",
  "qiime tools export",
  "qiime tools export",
];

describe("runPipeline", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  const setup = (
    files: Record<string, string | Uint8Array> = {},
    overrides: PipelineConfigInput = {},
    options: RecordingOptions = {}
  ) => {
    const dir = createWorkspace(files);
    dirs.push(dir);
    const config = resolveConfig({ workDir: dir, ...overrides });
    const recorder = createRecordingRunner(options);
    const program = runPipeline(config).pipe(
      Effect.provide(recorder.layer),
      Effect.provide(QuietNodeContext)
    );
    return { dir, config, layout: createLayout(config.outputDir), recorder, program };
  };

  const command = (args: readonly string[], tool: string): string =>
    [tool, ...args.slice(0, 2)].join(" ");

  test("runs all invocations in their fixed order", async () => {
    const { recorder, program } = setup();

    await Effect.runPromise(program);

    expect(recorder.calls.map((call) => command(call.invocation.args, call.invocation.tool))).toEqual(
      EXPECTED_COMMANDS
    );
  });

  test("passes the denoising parameters from the configuration", async () => {
    const { recorder, program, layout } = setup();

    await Effect.runPromise(program);

    const denoise = recorder.calls[2]?.invocation.args ?? [];
    const value = (flag: string) => denoise[denoise.indexOf(flag) + 1];
    expect(value("--p-trim-left")).toBe("15");
    expect(value("--p-trunc-len")).toBe("0");
    expect(value("--p-trunc-q")).toBe("20");
    expect(value("--i-demultiplexed-seqs")).toBe(layout.demux.artifact);
  });

  test("hands the thread count to exactly five invocations", async () => {
    const { recorder, program } = setup({}, { threads: 7 });

    await Effect.runPromise(program);

    const threaded = recorder.calls
      .map((call) => threadArgument(call.invocation))
      .filter((value) => value !== undefined);
    expect(threaded).toEqual(["7", "7", "7", "7", "7"]);
  });

  test("tags each invocation with its stage", async () => {
    const { recorder, program } = setup();

    await Effect.runPromise(program);

    const counts = new Map<string, number>();
    for (const call of recorder.calls) {
      counts.set(call.stage, (counts.get(call.stage) ?? 0) + 1);
    }
    expect(Object.fromEntries(counts)).toEqual({
      import: 2,
      denoise: 4,
      taxonomy: 3,
      phylogeny: 4,
      diversity: 5,
      export: 7,
    });
  });

  test("converts extracted alignments before importing", async () => {
    const { dir, recorder, program } = setup({
      "S1.zip": zipSync({ "reads.bam": strToU8("bam") }),
    });

    await Effect.runPromise(program);

    expect(recorder.calls[0]?.stage).toBe("convert");
    expect(recorder.calls[0]?.invocation.args).toEqual(["bam2fq", join(dir, "S1.bam")]);
    expect(recorder.calls[1]?.invocation.args.slice(0, 2)).toEqual(["tools", "import"]);
    expect(recorder.calls).toHaveLength(26);
  });

  test("writes the run report", async () => {
    const { config, layout, program } = setup();

    const report = await Effect.runPromise(program);

    expect(report.stages.map((stage) => stage.stage)).toEqual([...STAGE_ORDER]);
    const written = JSON.parse(readFileSync(layout.report, "utf8"));
    expect(written.config.outputDir).toBe(config.outputDir);
    expect(written.stages).toHaveLength(8);
    expect(written.stages[7].invocations).toHaveLength(7);
  });

  test("stops at the first failing invocation", async () => {
    const { layout, recorder, program } = setup({}, {}, {
      failWhen: (invocation) => invocation.args[1] === "mafft",
      exitCode: 2,
    });

    const error = await Effect.runPromise(Effect.flip(program));

    expect(error).toBeInstanceOf(ToolExecutionError);
    expect(error.message).toBe('qiime exited with status 2 during stage "phylogeny"');
    expect(recorder.calls).toHaveLength(10);
    expect(recorder.calls.at(-1)?.invocation.args[1]).toBe("mafft");
    expect(existsSync(layout.report)).toBe(false);
  });

  test("fails when an invocation does not produce its declared output", async () => {
    const { layout, recorder, program } = setup({}, {}, {
      skipOutputsWhen: (invocation) => invocation.args[1] === "denoise-pyro",
    });

    const error = await Effect.runPromise(Effect.flip(program));

    expect(error).toBeInstanceOf(ArtifactMissingError);
    expect(error.message).toBe(
      `Stage "denoise" finished but did not produce ${layout.denoising.table}`
    );
    expect(recorder.calls).toHaveLength(3);
  });

  test("skips output checks when verification is off", async () => {
    const { recorder, program } = setup({}, { verifyOutputs: false }, {
      skipOutputsWhen: () => true,
    });

    await Effect.runPromise(program);

    expect(recorder.calls).toHaveLength(25);
  });

  test("overwrites a previous run", async () => {
    const { layout, program } = setup();

    await Effect.runPromise(program);
    const stale = join(layout.diversity.coreMetrics, "stale.qza");
    writeFileSync(stale, "old");
    await Effect.runPromise(program);

    expect(existsSync(stale)).toBe(false);
    expect(existsSync(layout.diversity.jaccard)).toBe(true);
  });

  describe("preflight", () => {
    test("rejects an invalid direction before any tool runs", async () => {
      const { recorder, program } = setup({
        "manifest.tsv": "sample-id\tabsolute-filepath\tdirection\nS1\t/reads/S1.fastq\tboth\n",
      });

      const error = await Effect.runPromise(Effect.flip(program));

      expect(error).toBeInstanceOf(ManifestError);
      expect(recorder.calls).toEqual([]);
    });

    test("rejects manifest samples missing from the metadata", async () => {
      const { dir, recorder, program } = setup({
        "metadata.tsv": "sample-id\tsite\nS2\tskin\n",
      });

      const error = await Effect.runPromise(Effect.flip(program));

      expect(error.message).toBe(
        `${join(dir, "metadata.tsv")}: No metadata for 1 manifest sample(s): S1`
      );
      expect(recorder.calls).toEqual([]);
    });

    test("reports a missing manifest as a file error", async () => {
      const { dir, recorder, program } = setup({}, { manifestFile: "missing.tsv" });

      const error = await Effect.runPromise(Effect.flip(program));

      expect(error).toBeInstanceOf(FileError);
      expect(
        error.message.startsWith(`read failed for ${join(dir, "missing.tsv")}: NotFound: `)
      ).toBe(true);
      expect(recorder.calls).toEqual([]);
    });
  });

  test("a dry run records every invocation without touching archives", async () => {
    const { dir, recorder, program } = setup(
      { "S1.zip": zipSync({ "reads.bam": strToU8("bam") }) },
      { dryRun: true },
      { skipOutputsWhen: () => true }
    );

    await Effect.runPromise(program);

    expect(existsSync(join(dir, "S1.bam"))).toBe(false);
    expect(recorder.calls).toHaveLength(25);
  });
});
