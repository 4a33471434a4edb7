import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../../errors";
import type { StageDefinition } from "../context";
import { timed } from "../execute";
import { OUTPUT_SUBDIRECTORIES } from "../layout";

/**
 * Create the output root and its four subdirectories
 *
 * Recursive creation makes a re-run on an existing tree a no-op.
 */
export const setupStage: StageDefinition = {
  id: "setup",
  banner: "Setting up directories...",
  run: ({ layout }) =>
    timed(
      "setup",
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        const dirs = [layout.root, ...OUTPUT_SUBDIRECTORIES.map((name) => layout.dirs[name])];

        for (const dir of dirs) {
          yield* fs
            .makeDirectory(dir, { recursive: true })
            .pipe(Effect.mapError((error) => FileError.fromSystemError("mkdir", dir, error)));
        }
        return [];
      })
    ),
};
