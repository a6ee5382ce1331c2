/**
 * File writing operations using Effect Platform
 *
 * Promise-based wrappers over the Effect FileSystem service. Output is
 * written as given: assembled FASTA is never compressed.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit } from "effect";
import { FileError } from "../errors";

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  /**
   * Write string content to the file
   */
  writeString(content: string): Promise<void>;

  /**
   * Write binary data to the file
   */
  writeBytes(content: Uint8Array): Promise<void>;
}

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} When the write fails
 *
 * @example
 * ```typescript
 * await writeString("scaffolds.fasta", ">scaf1\nACGT\n");
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const data = new TextEncoder().encode(content);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFile(path, data);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Open file for writing and execute callback with write handle
 *
 * The file is opened with 644 permissions and closed by Effect's scoped
 * resource management once the callback settles. An error thrown by the
 * callback is rethrown unchanged; failures of the file itself become
 * `FileError`.
 *
 * @param path - File path to open (creates if not exists, overwrites if exists)
 * @param callback - Receives the write handle; its result is returned
 *
 * @example
 * ```typescript
 * await openForWriting("scaffolds.fasta", async (handle) => {
 *   for await (const chunk of assembleFasta(records, provider)) {
 *     await handle.writeString(chunk);
 *   }
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>
): Promise<T> {
  const encoder = new TextEncoder();

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;

    const file = yield* fs
      .open(path, { flag: "w", mode: 0o644 })
      .pipe(Effect.mapError((error) => FileError.fromSystemError("open", path, error)));

    const writeAll = async (data: Uint8Array): Promise<void> => {
      const exit = await Effect.runPromiseExit(file.writeAll(data));
      if (Exit.isFailure(exit)) {
        throw FileError.fromSystemError("write", path, Cause.squash(exit.cause));
      }
    };

    const handle: FileWriteHandle = {
      writeString: (content: string) => writeAll(encoder.encode(content)),
      writeBytes: (content: Uint8Array) => writeAll(content),
    };

    return yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });
  });

  const exit = await Effect.runPromiseExit(
    program.pipe(Effect.scoped, Effect.provide(NodeContext.layer))
  );

  if (Exit.isFailure(exit)) {
    throw Cause.squash(exit.cause);
  }
  return exit.value;
}
