/**
 * Error handling for the amplicon pipeline
 *
 * Every failure in a run surfaces as one of these classes. The pipeline
 * itself never catches them: they travel the Effect error channel up to
 * the CLI, which prints the message and a suggestion.
 */

import { isPlatformError } from "@effect/platform/Error";
import type { StageId } from "./types";

/**
 * Render any failure cause as one line
 *
 * Platform errors are plain tagged objects rather than Error instances,
 * so they are spelled out field by field.
 */
export function describeCause(cause: unknown): string {
  if (isPlatformError(cause)) {
    if (cause._tag === "SystemError") {
      const detail = cause.message !== undefined ? `: ${cause.message}` : "";
      return `${cause.reason}: ${cause.module}.${cause.method} (${String(cause.pathOrDescriptor)})${detail}`;
    }
    const detail = cause.message !== undefined ? `: ${cause.message}` : "";
    return `BadArgument: ${cause.module}.${cause.method}${detail}`;
  }
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Base error class for all ionflow errors
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "PipelineError";
  }

  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed configuration or input tables
 */
export class ValidationError extends PipelineError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Invalid configuration value
 */
export class ConfigError extends ValidationError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(field !== undefined ? `${message} (field "${field}")` : message);
    this.name = "ConfigError";
  }
}

/**
 * Manifest or metadata table problem, with line/column context
 */
export class ManifestError extends ValidationError {
  constructor(
    message: string,
    public readonly file: string,
    public readonly line?: number,
    public readonly column?: string
  ) {
    const location = [
      line !== undefined && `line ${line}`,
      column !== undefined && `column "${column}"`,
    ]
      .filter(Boolean)
      .join(", ");

    super(location ? `${file}: ${message} (${location})` : `${file}: ${message}`);
    this.name = "ManifestError";
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends PipelineError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "list" | "mkdir" | "remove",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", context);
    this.name = "FileError";
  }

  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = describeCause(systemError);
    const suggestion = FileError.getSuggestionForSystemError(systemError, errorMessage);

    return new FileError(
      `${operation} failed for ${filePath}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(
    systemError: unknown,
    errorMessage: string
  ): string | undefined {
    if (isPlatformError(systemError) && systemError._tag === "SystemError") {
      switch (systemError.reason) {
        case "NotFound":
          return "Check that the path is correct and the file exists";
        case "PermissionDenied":
          return "Check file permissions";
        case "AlreadyExists":
          return "Remove the existing file or choose another path";
        default:
          break;
      }
    }

    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or choose another output directory";
    }

    return undefined;
  }
}

/**
 * Raw read archive that cannot be extracted
 */
export class ArchiveError extends PipelineError {
  constructor(
    message: string,
    public readonly archivePath: string,
    public readonly operation: "read" | "extract"
  ) {
    super(message, "ARCHIVE_ERROR", `Archive: ${archivePath}`);
    this.name = "ArchiveError";
  }
}

/**
 * An external tool exited non-zero or could not be started
 */
export class ToolExecutionError extends PipelineError {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly args: readonly string[],
    public readonly stage: StageId,
    public readonly exitCode?: number
  ) {
    super(message, "TOOL_ERROR", `Command: ${[tool, ...args].join(" ")}`);
    this.name = "ToolExecutionError";
  }

  static forExitCode(
    tool: string,
    args: readonly string[],
    stage: StageId,
    exitCode: number
  ): ToolExecutionError {
    return new ToolExecutionError(
      `${tool} exited with status ${exitCode} during stage "${stage}"`,
      tool,
      args,
      stage,
      exitCode
    );
  }

  static forSpawnFailure(
    tool: string,
    args: readonly string[],
    stage: StageId,
    cause: unknown
  ): ToolExecutionError {
    return new ToolExecutionError(
      `Could not run ${tool} during stage "${stage}": ${describeCause(cause)}`,
      tool,
      args,
      stage
    );
  }
}

/**
 * A tool exited 0 but its declared output is not on disk
 */
export class ArtifactMissingError extends PipelineError {
  constructor(
    public readonly stage: StageId,
    public readonly artifactPath: string
  ) {
    super(
      `Stage "${stage}" finished but did not produce ${artifactPath}`,
      "ARTIFACT_MISSING"
    );
    this.name = "ArtifactMissingError";
  }
}

/**
 * Every error the pipeline can fail with
 */
export type PipelineFailure =
  | ConfigError
  | ManifestError
  | FileError
  | ArchiveError
  | ToolExecutionError
  | ArtifactMissingError;

export const ERROR_SUGGESTIONS = {
  CONFIG: "Check the configuration file and command-line overrides",
  MANIFEST:
    "Manifest needs the columns sample-id, absolute-filepath and direction; metadata needs a sample id column",
  TOOL_NOT_FOUND: "Make sure the QIIME 2 environment is activated and the tool is on PATH",
  TOOL_FAILED: "Read the tool's own output above for the cause",
  ARTIFACT_MISSING: "The tool may have written its output elsewhere; check its output above",
  ARCHIVE: "Re-download the archive; it may be truncated or not a zip file",
  FILE: "Check the path and its permissions",
} as const;

/**
 * Get a one-line hint for an error
 */
export function getErrorSuggestion(error: PipelineError): string {
  if (error instanceof ConfigError) {
    return ERROR_SUGGESTIONS.CONFIG;
  }
  if (error instanceof ManifestError) {
    return ERROR_SUGGESTIONS.MANIFEST;
  }
  if (error instanceof ToolExecutionError) {
    return error.exitCode === undefined
      ? ERROR_SUGGESTIONS.TOOL_NOT_FOUND
      : ERROR_SUGGESTIONS.TOOL_FAILED;
  }
  if (error instanceof ArtifactMissingError) {
    return ERROR_SUGGESTIONS.ARTIFACT_MISSING;
  }
  if (error instanceof ArchiveError) {
    return ERROR_SUGGESTIONS.ARCHIVE;
  }
  return ERROR_SUGGESTIONS.FILE;
}
