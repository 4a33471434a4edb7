import type { FileSystem } from "@effect/platform";
import type { Effect } from "effect";
import type { PipelineConfig } from "../config";
import type { PipelineFailure } from "../errors";
import type { ToolRunner } from "../tools/runner";
import type { StageId, StageResult } from "../types";
import type { OutputLayout } from "./layout";

/**
 * Everything a stage needs, fixed for the whole run
 */
export interface StageContext {
  readonly config: PipelineConfig;
  readonly layout: OutputLayout;
  /** Check declared outputs after each invocation */
  readonly verify: boolean;
  /** Skip in-process side effects that a dry run must not perform */
  readonly dryRun: boolean;
}

export type StageRequirements = FileSystem.FileSystem | ToolRunner;

export type Stage = (
  context: StageContext
) => Effect.Effect<StageResult, PipelineFailure, StageRequirements>;

export interface StageDefinition {
  readonly id: StageId;
  /** Progress banner logged when the stage starts */
  readonly banner: string;
  readonly run: Stage;
}
