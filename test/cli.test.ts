import { existsSync, rmSync } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { main, parseCliArgs, UsageError } from "../src/cli";
import { ERROR_SUGGESTIONS } from "../src/errors";
import { createWorkspace } from "./utils/workspace";

describe("parseCliArgs", () => {
  test("maps flags onto configuration overrides", () => {
    const options = parseCliArgs([
      "--config",
      "run.json",
      "--work-dir",
      "/data/run",
      "--output-dir",
      "out",
      "--threads",
      "8",
      "--sampling-depth",
      "1200",
      "--classifier",
      "nb.qza",
      "--dry-run",
    ]);

    expect(options.configFile).toBe("run.json");
    expect(options.overrides).toEqual({
      workDir: "/data/run",
      outputDir: "out",
      threads: 8,
      samplingDepth: 1200,
      classifier: "nb.qza",
      dryRun: true,
    });
    expect(options.verbose).toBe(false);
  });

  test("an empty command line means defaults", () => {
    expect(parseCliArgs([])).toEqual({ overrides: {}, verbose: false, help: false });
  });

  test("rejects non-numeric counts", () => {
    expect(() => parseCliArgs(["--threads", "many"])).toThrow(
      '--threads expects a non-negative integer, got "many"'
    );
  });

  test("rejects unknown flags and positionals", () => {
    expect(() => parseCliArgs(["--thread", "4"])).toThrow(UsageError);
    expect(() => parseCliArgs(["extra"])).toThrow(UsageError);
  });
});

describe("main", () => {
  const dirs: string[] = [];
  let errors: string[];

  beforeEach(() => {
    errors = [];
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(" "));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  test("--help exits 0", async () => {
    expect(await main(["--help"])).toBe(0);
  });

  test("a usage error exits 2", async () => {
    expect(await main(["--bogus"])).toBe(2);
  });

  test("a dry run completes and writes the report", async () => {
    const dir = createWorkspace();
    dirs.push(dir);

    expect(await main(["--work-dir", dir, "--dry-run"])).toBe(0);
    expect(existsSync(join(dir, "results", "pipeline-report.json"))).toBe(true);
  });

  test("a failing run exits 1 with the message and a suggestion", async () => {
    const dir = createWorkspace({ "metadata.tsv": "sample-id\tsite\n" });
    dirs.push(dir);

    expect(await main(["--work-dir", dir, "--dry-run"])).toBe(1);
    expect(errors).toEqual([
      `Error: ${join(dir, "metadata.tsv")}: No metadata for 2 manifest sample(s): S1, S2`,
      `Suggestion: ${ERROR_SUGGESTIONS.MANIFEST}`,
    ]);
  });

  test("invalid configuration values exit 1", async () => {
    expect(await main(["--threads", "0", "--dry-run"])).toBe(1);
    expect(errors[1]).toBe(`Suggestion: ${ERROR_SUGGESTIONS.CONFIG}`);
  });
});
