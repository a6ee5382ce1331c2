/**
 * File reading on top of the Effect platform FileSystem
 *
 * Every operation validates its path, runs an Effect program against the
 * Node platform layer, and reports failures as `FileError`. Callers get plain
 * promises and never see Effect types.
 */

import { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { type } from "arktype";
import { Effect, Option, Stream } from "effect";
import { FileError } from "../errors";
import type { FileMetadata, FilePath, FileReaderOptions, FileValidationResult } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  encoding: "utf8",
  maxFileSize: 10_737_418_240,
};

/**
 * Run a program against the Node platform, mapping any failure to FileError
 */
async function runFileProgram<A>(
  program: Effect.Effect<A, unknown, FileSystem.FileSystem>,
  operation: FileError["operation"],
  path: FilePath
): Promise<A> {
  try {
    return await Effect.runPromise(program.pipe(Effect.provide(NodeContext.layer)));
  } catch (error) {
    throw FileError.fromSystemError(operation, path, error);
  }
}

/**
 * Validate file accessibility and size constraints
 */
async function validateFile(
  path: FilePath,
  options: Required<FileReaderOptions>
): Promise<FileValidationResult> {
  if (!(await exists(path))) {
    return {
      isValid: false,
      error: `File not found: ${path}`,
    };
  }

  const metadata = await getMetadata(path);

  if (metadata.size > options.maxFileSize) {
    return {
      isValid: false,
      metadata,
      error: `File size ${metadata.size} exceeds maximum ${options.maxFileSize}`,
    };
  }

  return { isValid: true, metadata };
}

/**
 * Check if a path exists and is a regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  return runFileProgram(program, "stat", validatedPath);
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return Number(info.size);
  });

  return runFileProgram(program, "stat", validatedPath);
}

/**
 * Get file metadata
 *
 * @throws {FileError} If file cannot be accessed
 */
export async function getMetadata(path: string): Promise<FileMetadata> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);

    return {
      path: validatedPath,
      size: Number(info.size),
      lastModified: Option.getOrElse(info.mtime, () => new Date(0)),
      extension: validatedPath.substring(validatedPath.lastIndexOf(".")),
    };
  });

  return runFileProgram(program, "stat", validatedPath);
}

/**
 * Create a streaming reader for a file
 *
 * @throws {FileError} If the file is missing, too large or cannot be opened
 *
 * @example
 * ```typescript
 * const stream = await createStream("scaffolds.agp");
 * for await (const line of readLines(stream)) {
 *   console.log(line);
 * }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const validation = await validateFile(validatedPath, mergedOptions);
  if (!validation.isValid) {
    throw new FileError(validation.error ?? "File validation failed", validatedPath, "read");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      chunkSize: FileSystem.Size(mergedOptions.bufferSize),
    });
    return Stream.toReadableStream(effectStream);
  });

  return runFileProgram(program, "open", validatedPath);
}

/**
 * Read an entire file to a string
 *
 * @throws {FileError} If file cannot be read or exceeds the size limit
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  const fileSize = await getSize(validatedPath);
  if (fileSize > mergedOptions.maxFileSize) {
    throw new FileError(
      `File too large: ${fileSize} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
      validatedPath,
      "read"
    );
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(validatedPath);
  });

  return runFileProgram(program, "read", validatedPath);
}

/**
 * Read a byte range from a file
 *
 * Used for random access into indexed FASTA files.
 *
 * @param start - Starting byte offset (inclusive)
 * @param end - Ending byte offset (exclusive)
 * @throws {FileError} If file cannot be read or range is invalid
 *
 * @example
 * ```typescript
 * const bytes = await readByteRange("components.fasta", 6, 16);
 * const bases = new TextDecoder().decode(bytes);
 * ```
 */
export async function readByteRange(path: string, start: number, end: number): Promise<Uint8Array> {
  const validatedPath = validatePath(path);

  if (start < 0 || end < 0) {
    throw new FileError("Byte range must be non-negative", validatedPath, "read");
  }
  if (start >= end) {
    throw new FileError("Start byte must be less than end byte", validatedPath, "read");
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const file = yield* fs.open(validatedPath, { flag: "r" });
    yield* file.seek(FileSystem.Size(start), "start");
    const bytes = yield* file.readAlloc(FileSystem.Size(end - start));
    return Option.getOrElse(bytes, () => new Uint8Array(0));
  }).pipe(Effect.scoped);

  const bytes = await runFileProgram(program, "read", validatedPath);
  if (bytes.length !== end - start) {
    throw new FileError(
      `Short read: expected ${end - start} bytes at offset ${start}, got ${bytes.length}`,
      validatedPath,
      "read"
    );
  }
  return bytes;
}

export const FileReader = {
  exists,
  getSize,
  getMetadata,
  createStream,
  readToString,
  readByteRange,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType and return branded type
 */
function validatePath(path: string): FilePath {
  try {
    const validationResult = FilePathSchema(path);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
    }
    return validationResult;
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat",
      error
    );
  }
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  try {
    const validationResult = FileReaderOptionsSchema(merged);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
    }
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(
      `Invalid file reader options: ${error instanceof Error ? error.message : String(error)}`,
      "",
      "read",
      error
    );
  }

  return merged;
}
