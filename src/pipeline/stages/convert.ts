/**
 * Archive extraction and BAM to FASTQ conversion
 *
 * Both loops look only at the top level of the working directory and
 * skip anything that is not a regular file, so a run with no archives or
 * no alignments passes through silently.
 */

import { join } from "path";
import { FileSystem } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect, Option } from "effect";
import { extractArchive } from "../../archive";
import { FileError } from "../../errors";
import { bam2fq } from "../../tools/samtools";
import type { ToolInvocation } from "../../types";
import type { StageDefinition } from "../context";
import { execute, timed } from "../execute";

const isNotFound = (error: PlatformError): boolean =>
  error._tag === "SystemError" && error.reason === "NotFound";

/**
 * Regular files in `dir` ending in `extension`, sorted by name
 */
export const listFilesWithExtension = (
  dir: string,
  extension: string
): Effect.Effect<string[], FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const names = yield* fs
      .readDirectory(dir)
      .pipe(Effect.mapError((error) => FileError.fromSystemError("list", dir, error)));

    const matches: string[] = [];
    for (const name of [...names].sort()) {
      if (!name.endsWith(extension) || name.length === extension.length) {
        continue;
      }
      const path = join(dir, name);
      // A dangling symlink or an entry removed since the listing counts as absent
      const info = yield* fs.stat(path).pipe(
        Effect.map(Option.some),
        Effect.catchIf(isNotFound, () => Effect.succeed(Option.none<FileSystem.File.Info>())),
        Effect.mapError((error) => FileError.fromSystemError("stat", path, error))
      );
      if (Option.isSome(info) && info.value.type === "File") {
        matches.push(path);
      }
    }
    return matches;
  });

/**
 * Replace a known extension: `run/S1.zip` -> `run/S1.bam`
 */
export const swapExtension = (path: string, from: string, to: string): string =>
  `${path.slice(0, path.length - from.length)}${to}`;

export const convertStage: StageDefinition = {
  id: "convert",
  banner: "Converting BAM files to FASTQ...",
  run: (context) =>
    timed(
      "convert",
      Effect.gen(function* () {
        const { workDir } = context.config;

        const archives = yield* listFilesWithExtension(workDir, ".zip");
        for (const archive of archives) {
          const bamPath = swapExtension(archive, ".zip", ".bam");
          if (context.dryRun) {
            yield* Effect.logInfo(`[dry-run] extract ${archive} > ${bamPath}`);
            continue;
          }
          const extracted = yield* extractArchive(archive, bamPath);
          yield* Effect.logDebug(
            `Extracted ${extracted.members.join(", ")} (${extracted.bytes} bytes) to ${bamPath}`
          );
        }

        // Listed after extraction so freshly extracted alignments are converted too
        const alignments = yield* listFilesWithExtension(workDir, ".bam");
        const invocations: ToolInvocation[] = [];
        for (const bamPath of alignments) {
          const invocation = bam2fq(bamPath, swapExtension(bamPath, ".bam", ".fastq"));
          yield* execute("convert", invocation, context.verify);
          yield* Effect.logInfo(`Converted: ${bamPath}`);
          invocations.push(invocation);
        }

        if (alignments.length === 0) {
          yield* Effect.logDebug(`No .bam files in ${workDir}; nothing to convert`);
        }
        return invocations;
      })
    ),
};
