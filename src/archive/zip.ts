/**
 * Raw read archive extraction
 *
 * Ion Torrent runs are delivered as one zip per sample holding the BAM.
 * Extraction mirrors `unzip -p archive.zip > archive.bam`: every file
 * member is written, in archive order, to a single output.
 *
 * The archive is streamed through fflate's `Unzip`, so memory use stays
 * at a few chunks regardless of archive size.
 */

import { FileSystem } from "@effect/platform";
import { Effect, Sink, Stream } from "effect";
import { Unzip, UnzipInflate, type UnzipFile } from "fflate";
import { ArchiveError, FileError } from "../errors";

export interface ExtractionResult {
  readonly archive: string;
  readonly output: string;
  /** Member names that were written, in order */
  readonly members: readonly string[];
  readonly bytes: number;
}

/**
 * Local file header and end-of-central-directory signatures ("PK\x03\x04", "PK\x05\x06")
 */
const ZIP_SIGNATURES = [
  [0x50, 0x4b, 0x03, 0x04],
  [0x50, 0x4b, 0x05, 0x06],
] as const;

const hasZipSignature = (chunk: Uint8Array): boolean =>
  ZIP_SIGNATURES.some((signature) => signature.every((byte, i) => chunk[i] === byte));

/**
 * Push-based decoder state for one archive
 *
 * Decompressed chunks are queued synchronously while a compressed chunk is
 * pushed, so draining after each push keeps member order intact.
 */
class MemberDecoder {
  readonly members: string[] = [];
  bytes = 0;
  private readonly pending: Uint8Array[] = [];
  private failure: Error | undefined;
  private started = false;
  private readonly unzip: Unzip;

  constructor(private readonly archivePath: string) {
    this.unzip = new Unzip((file) => this.onFile(file));
    this.unzip.register(UnzipInflate);
  }

  private onFile(file: UnzipFile): void {
    // Directory entries are never started, so their data is skipped
    if (file.name.endsWith("/")) {
      return;
    }
    this.members.push(file.name);
    file.ondata = (error, data) => {
      if (error !== null) {
        this.failure = error;
        return;
      }
      if (data.length > 0) {
        this.pending.push(data);
        this.bytes += data.length;
      }
    };
    file.start();
  }

  /**
   * Feed one compressed chunk and return the decompressed chunks it released
   */
  push(chunk: Uint8Array, final: boolean): Effect.Effect<Uint8Array[], ArchiveError> {
    return Effect.try({
      try: () => {
        if (!this.started && chunk.length > 0) {
          this.started = true;
          if (!hasZipSignature(chunk)) {
            throw new Error("not a zip archive");
          }
        }
        this.unzip.push(chunk, final);
        if (this.failure !== undefined) {
          throw this.failure;
        }
        return this.pending.splice(0);
      },
      catch: (error) =>
        new ArchiveError(
          `Cannot read zip archive: ${error instanceof Error ? error.message : String(error)}`,
          this.archivePath,
          "read"
        ),
    });
  }
}

/**
 * Extract every file member of a zip archive into one output file
 *
 * Directory entries are ignored. The output is overwritten if it exists,
 * and removed again when the archive turns out to hold no files.
 */
export const extractArchive = (
  archivePath: string,
  outputPath: string
): Effect.Effect<ExtractionResult, ArchiveError | FileError, FileSystem.FileSystem> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const decoder = new MemberDecoder(archivePath);

    const compressed = fs
      .stream(archivePath)
      .pipe(Stream.mapError((error) => FileError.fromSystemError("read", archivePath, error)));

    const decompressed = compressed.pipe(
      Stream.mapEffect((chunk) => decoder.push(chunk, false)),
      Stream.concat(Stream.fromEffect(Effect.suspend(() => decoder.push(new Uint8Array(0), true)))),
      Stream.flattenIterables
    );

    const target = fs
      .sink(outputPath)
      .pipe(Sink.mapError((error) => FileError.fromSystemError("write", outputPath, error)));

    yield* Stream.run(decompressed, target);

    if (decoder.members.length === 0) {
      yield* fs
        .remove(outputPath)
        .pipe(Effect.mapError((error) => FileError.fromSystemError("remove", outputPath, error)));
      return yield* Effect.fail(
        new ArchiveError("Archive contains no files", archivePath, "extract")
      );
    }

    return {
      archive: archivePath,
      output: outputPath,
      members: decoder.members,
      bytes: decoder.bytes,
    };
  });
