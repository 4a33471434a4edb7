/**
 * Pipeline driver
 *
 * Runs the eight stages strictly in order on a single fiber. A failure in
 * any stage propagates unchanged and the stages after it never start.
 * After the last stage the run report is written beside the outputs.
 */

import { FileSystem } from "@effect/platform";
import { Clock, Effect } from "effect";
import type { PipelineConfig } from "../config";
import { FileError, type PipelineFailure } from "../errors";
import type { StageResult } from "../types";
import type { StageContext, StageRequirements } from "./context";
import { createLayout, type OutputLayout } from "./layout";
import { STAGES } from "./stages";

export interface PipelineReport {
  readonly config: PipelineConfig;
  readonly layout: OutputLayout;
  readonly stages: readonly StageResult[];
  readonly startedAt: number;
  readonly completedAt: number;
}

/**
 * Serialize a report as indented JSON with a trailing newline
 */
export function formatReport(report: PipelineReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

const writeReport = (
  report: PipelineReport
): Effect.Effect<void, FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = report.layout.report;
    yield* fs
      .writeFileString(path, formatReport(report))
      .pipe(Effect.mapError((error) => FileError.fromSystemError("write", path, error)));
  });

/**
 * Run every stage and write `<outputDir>/pipeline-report.json`
 */
export const runPipeline = (
  config: PipelineConfig
): Effect.Effect<PipelineReport, PipelineFailure, StageRequirements> =>
  Effect.gen(function* () {
    const layout = createLayout(config.outputDir);
    const context: StageContext = {
      config,
      layout,
      verify: config.verifyOutputs && !config.dryRun,
      dryRun: config.dryRun,
    };

    const startedAt = yield* Clock.currentTimeMillis;
    const stages = yield* Effect.forEach(STAGES, (stage) =>
      Effect.logInfo(stage.banner).pipe(
        Effect.zipRight(stage.run(context)),
        Effect.annotateLogs("stage", stage.id)
      )
    );
    const completedAt = yield* Clock.currentTimeMillis;

    const report: PipelineReport = { config, layout, stages, startedAt, completedAt };
    yield* writeReport(report);

    yield* Effect.logInfo("Pipeline completed successfully!");
    yield* Effect.logInfo(`Output files are located in: ${layout.root}`);
    yield* Effect.logInfo("Next steps:");
    yield* Effect.logInfo(`  1. Check quality plots: qiime tools view ${layout.demux.visualization}`);
    yield* Effect.logInfo(
      `  2. Review rarefaction curves: qiime tools view ${layout.diversity.alphaRarefaction}`
    );
    yield* Effect.logInfo(`  3. Explore taxa barplot: qiime tools view ${layout.taxonomy.barplot}`);
    yield* Effect.logInfo(`  4. Use exported data in ${layout.dirs.exports} for downstream analysis`);

    return report;
  });
