/**
 * Core type definitions for the amplicon pipeline
 *
 * Toolkit artifacts are opaque to ionflow: the types here describe the
 * paths and command lines that thread them between stages, never their
 * contents.
 */

import { type } from "arktype";

/**
 * Pipeline stages in execution order
 */
export const STAGE_ORDER = [
  "setup",
  "convert",
  "import",
  "denoise",
  "taxonomy",
  "phylogeny",
  "diversity",
  "export",
] as const;

export type StageId = (typeof STAGE_ORDER)[number];

/**
 * Read direction column values accepted in a single-end manifest
 */
export const ReadDirectionSchema = type('"forward" | "reverse"');
export type ReadDirection = typeof ReadDirectionSchema.infer;

/**
 * External executables the pipeline shells out to
 */
export type ToolName = "qiime" | "samtools" | "biom";

/**
 * A path an invocation promises to leave on disk
 */
export interface ArtifactRef {
  readonly path: string;
  readonly kind: "file" | "directory";
}

/**
 * One external command, fully resolved
 *
 * `args` is an argv array: nothing is passed through a shell.
 */
export interface ToolInvocation {
  readonly tool: ToolName;
  readonly args: readonly string[];
  /** Redirect stdout into this file instead of inheriting it */
  readonly stdoutPath?: string;
  /** Outputs checked after the command exits 0 */
  readonly outputs: readonly ArtifactRef[];
}

export interface StageResult {
  readonly stage: StageId;
  readonly invocations: readonly ToolInvocation[];
  readonly startedAt: number;
  readonly completedAt: number;
}

/**
 * One manifest row
 */
export interface ManifestEntry {
  readonly sampleId: string;
  readonly filePath: string;
  readonly direction: ReadDirection;
  readonly lineNumber: number;
}

/**
 * Parsed sample metadata: sample ids plus annotation columns
 */
export interface SampleMetadata {
  readonly idColumn: string;
  readonly columns: readonly string[];
  readonly samples: ReadonlyMap<string, Readonly<Record<string, string>>>;
}
