import { FileSystem, Path } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Effect, HashSet, Ref } from "effect";
import { buildPdfFileName } from "../../lib/util.js";

/**
 * Find the first free output name: the base name, then `_1`, `_2`, ... before
 * the extension. Only checks; nothing is reserved, so repeated calls against
 * the same directory return the same name.
 */
export const resolvePdfFileName = (
  outputDirectory: string,
  dateStamp: string,
  prefix: string,
  isClaimed: (fileName: string) => boolean = () => false,
): Effect.Effect<string, PlatformError, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;

    let counter = 0;
    while (true) {
      const fileName = buildPdfFileName(dateStamp, prefix, counter);
      const taken =
        isClaimed(fileName) ||
        (yield* fs.exists(path.join(outputDirectory, fileName)));
      if (!taken) {
        return fileName;
      }
      counter++;
    }
  });

export interface PdfNameAllocator {
  readonly claim: (
    dateStamp: string,
    prefix: string,
  ) => Effect.Effect<string, PlatformError>;
}

/**
 * Serializes check-and-claim for one output directory so that concurrent
 * conversions never receive the same name. Claimed names stay reserved for
 * the lifetime of the allocator.
 */
export const makePdfNameAllocator = (
  outputDirectory: string,
): Effect.Effect<PdfNameAllocator, never, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const context = yield* Effect.context<FileSystem.FileSystem | Path.Path>();
    const lock = yield* Effect.makeSemaphore(1);
    const claimed = yield* Ref.make(HashSet.empty<string>());

    const claim = (dateStamp: string, prefix: string) =>
      lock.withPermits(1)(
        Effect.gen(function* () {
          const current = yield* Ref.get(claimed);
          const fileName = yield* resolvePdfFileName(
            outputDirectory,
            dateStamp,
            prefix,
            (name) => HashSet.has(current, name),
          );
          yield* Ref.update(claimed, HashSet.add(fileName));
          return fileName;
        }),
      ).pipe(Effect.provide(context));

    return { claim };
  });
