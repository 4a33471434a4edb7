import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { NodeContext } from "@effect/platform-node";
import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  DEFAULT_CONFIG,
  loadConfigFile,
  type PipelineConfigInput,
  resolveConfig,
} from "../src/config";
import { ConfigError, FileError } from "../src/errors";

describe("resolveConfig", () => {
  test("applies defaults and resolves paths against the working directory", () => {
    const config = resolveConfig({}, "/data/run");

    expect(config.workDir).toBe("/data/run");
    expect(config.outputDir).toBe("/data/run/results");
    expect(config.manifestFile).toBe("/data/run/manifest.tsv");
    expect(config.metadataFile).toBe("/data/run/metadata.tsv");
    expect(config.classifier).toBe("/data/run/path/to/gg-13-8-99-515-806-nb-classifier.qza");
    expect(config.trimLeft).toBe(15);
    expect(config.truncLen).toBe(0);
    expect(config.truncQ).toBe(20);
    expect(config.samplingDepth).toBe(3400);
    expect(config.threads).toBe(4);
    expect(config.verifyOutputs).toBe(true);
    expect(config.dryRun).toBe(false);
  });

  test("resolves a relative workDir against cwd and keeps absolute paths", () => {
    const config = resolveConfig(
      { workDir: "run1", outputDir: "/scratch/out", classifier: "classifiers/nb.qza" },
      "/data"
    );

    expect(config.workDir).toBe("/data/run1");
    expect(config.outputDir).toBe("/scratch/out");
    expect(config.classifier).toBe("/data/run1/classifiers/nb.qza");
  });

  test("merges tool overrides with the default executables", () => {
    const config = resolveConfig({ tools: { qiime: "/opt/qiime2/bin/qiime" } }, "/data");
    expect(config.tools).toEqual({
      qiime: "/opt/qiime2/bin/qiime",
      samtools: "samtools",
      biom: "biom",
    });
  });

  test("rejects unknown keys", () => {
    const input: PipelineConfigInput = JSON.parse('{"thread": 2}');
    expect(() => resolveConfig(input, "/data")).toThrow('Unknown configuration key (field "thread")');
  });

  test("rejects zero threads", () => {
    expect(() => resolveConfig({ threads: 0 }, "/data")).toThrow(ConfigError);
  });

  test("rejects non-integer numbers", () => {
    expect(() => resolveConfig({ samplingDepth: 3400.5 }, "/data")).toThrow(ConfigError);
    expect(() => resolveConfig({ trimLeft: -1 }, "/data")).toThrow(ConfigError);
  });

  test("requires the rarefaction maximum to exceed the minimum", () => {
    expect(() =>
      resolveConfig({ rarefactionMinDepth: 100, rarefactionMaxDepth: 100 }, "/data")
    ).toThrow(/rarefactionMaxDepth/);
  });

  test("does not mutate the defaults", () => {
    resolveConfig({ threads: 16, tools: { biom: "/usr/local/bin/biom" } }, "/data");
    expect(DEFAULT_CONFIG.threads).toBe(4);
    expect(DEFAULT_CONFIG.tools.biom).toBe("biom");
  });
});

describe("loadConfigFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ionflow-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const load = (path: string) => loadConfigFile(path).pipe(Effect.provide(NodeContext.layer));

  test("reads a partial configuration", async () => {
    const path = join(dir, "run.json");
    writeFileSync(path, JSON.stringify({ threads: 8, samplingDepth: 1200 }));

    const input = await Effect.runPromise(load(path));
    expect(input).toEqual({ threads: 8, samplingDepth: 1200 });
  });

  test("fails with ConfigError on malformed JSON", async () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ threads: 8 ");

    const error = await Effect.runPromise(Effect.flip(load(path)));
    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message.startsWith(`Malformed JSON in ${path}: `)).toBe(true);
  });

  test("fails with ConfigError on values of the wrong type", async () => {
    const path = join(dir, "typed.json");
    writeFileSync(path, JSON.stringify({ threads: "four" }));

    const error = await Effect.runPromise(Effect.flip(load(path)));
    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message.startsWith(`Invalid configuration in ${path}: `)).toBe(true);
  });

  test("fails with FileError when the file is missing", async () => {
    const path = join(dir, "absent.json");
    const error = await Effect.runPromise(Effect.flip(load(path)));
    expect(error).toBeInstanceOf(FileError);
    expect(error instanceof FileError && error.operation).toBe("read");
  });
});
