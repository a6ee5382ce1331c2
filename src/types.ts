/**
 * Core type definitions shared across formats and I/O
 *
 * AGP record types live beside their parser in `formats/agp/types.ts`;
 * this module holds what the parsers, the index and the file layer share.
 */

import { type } from "arktype";
import { ResourceLimitError } from "./errors";

/**
 * Warning callback shared by parsers and the assembler
 */
export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Parser configuration options
 */
export interface ParserOptions {
  /** Maximum line length before the line is rejected */
  maxLineLength?: number;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: WarningHandler;
}

/**
 * Compression format detection with focus on genomics standards
 */
export type CompressionFormat = "gzip" | "zstd" | "none";

/**
 * Compression detection result
 */
export interface CompressionDetection {
  /** Detected compression format */
  readonly format: CompressionFormat;
  /** Magic bytes that led to detection */
  readonly magicBytes?: Uint8Array;
  /** File extension used in detection */
  readonly extension?: string;
  /** Whether detection used magic bytes vs extension */
  readonly detectionMethod: "magic-bytes" | "extension" | "hybrid";
}

/**
 * A sequence pulled out of an indexed FASTA file
 */
export interface FastaSequence {
  readonly format: "fasta";
  readonly id: string;
  readonly sequence: string;
  readonly length: number;
}

// =============================================================================
// FILE I/O TYPES
// =============================================================================

/**
 * Branded type for validated file paths
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Buffer size for streaming reads (default: 64KB) */
  readonly bufferSize?: number;
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: "utf8" | "binary";
  /** Maximum file size to prevent memory exhaustion (default: 100MB) */
  readonly maxFileSize?: number;
}

/**
 * File metadata used for validation and warnings
 */
export interface FileMetadata {
  /** Normalized file path */
  readonly path: FilePath;
  /** File size in bytes */
  readonly size: number;
  /** Last modification time */
  readonly lastModified: Date;
  /** File extension for format detection */
  readonly extension: string;
}

/**
 * File validation result with detailed feedback
 */
export interface FileValidationResult {
  /** Whether file is valid and accessible */
  readonly isValid: boolean;
  /** File metadata if accessible */
  readonly metadata?: FileMetadata;
  /** Validation error if any */
  readonly error?: string;
}

/**
 * Largest file the reader will stream (10GB)
 */
export const MAX_READABLE_FILE_SIZE = 10_737_418_240;

/**
 * File path validation schema
 *
 * Paths are opened as given; only a NUL byte is refused.
 */
export const FilePathSchema = type("string>0").pipe((path: string): FilePath => {
  if (path.includes("\0")) {
    throw new Error("File paths cannot contain null characters");
  }
  return path as FilePath;
});

/**
 * File reader options validation schema
 */
export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "encoding?": '"utf8"|"binary"',
  "maxFileSize?": "number>=0",
}).pipe((options) => {
  if (options.bufferSize !== undefined && options.bufferSize > 1_048_576) {
    throw ResourceLimitError.forBufferSize(options.bufferSize, 1_048_576, "File reader");
  }

  if (options.maxFileSize !== undefined && options.maxFileSize > MAX_READABLE_FILE_SIZE) {
    throw new ResourceLimitError(
      `File size limit too large: ${Math.round(options.maxFileSize / 1_073_741_824)}GB (maximum 10GB)`,
      "file-size",
      options.maxFileSize,
      MAX_READABLE_FILE_SIZE
    );
  }

  return options;
});
