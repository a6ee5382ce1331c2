/**
 * Error handling for AGP assembly
 *
 * Every failure in this library is fatal: the first error aborts the run.
 * Record-level failures carry the 1-based input line and a `kind` so
 * callers can branch on the category without inspecting messages.
 */

/**
 * Base error class for all agp2fasta errors
 */
export class AgpError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "AgpError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options and arguments
 */
export class ValidationError extends AgpError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends AgpError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Categories of AGP record failures
 */
export type AgpErrorKind =
  | "structural"
  | "coordinate"
  | "enum"
  | "ordering"
  | "coverage"
  | "consistency"
  | "retrieval";

/**
 * A record that failed validation or assembly
 *
 * `reason` is the bare description; `message` is the same text so that
 * `toString()` renders `Name: reason (line N)`.
 */
export abstract class AgpRecordError extends ParseError {
  abstract readonly kind: AgpErrorKind;

  constructor(
    public readonly reason: string,
    public override readonly lineNumber: number,
    context?: string
  ) {
    super(reason, "AGP", lineNumber, context);
    this.name = "AgpRecordError";
  }

  /**
   * Render in the `line N: reason` form used on the command line
   */
  describe(): string {
    return `line ${this.lineNumber}: ${this.reason}`;
  }
}

/**
 * Wrong field count, empty field, comment after the body started
 */
export class StructuralError extends AgpRecordError {
  readonly kind = "structural" as const;

  constructor(reason: string, lineNumber: number, context?: string) {
    super(reason, lineNumber, context);
    this.name = "StructuralError";
  }
}

/**
 * Non-integer, non-positive or inverted coordinates and lengths
 */
export class CoordinateError extends AgpRecordError {
  readonly kind = "coordinate" as const;

  constructor(reason: string, lineNumber: number, context?: string) {
    super(reason, lineNumber, context);
    this.name = "CoordinateError";
  }
}

/**
 * A value outside one of the AGP controlled vocabularies
 */
export class EnumError extends AgpRecordError {
  readonly kind = "enum" as const;

  constructor(
    reason: string,
    lineNumber: number,
    public readonly field: string,
    public readonly value: string,
    context?: string
  ) {
    super(reason, lineNumber, context);
    this.name = "EnumError";
  }
}

/**
 * Objects out of order, not starting at 1, or skipped part numbers
 */
export class OrderingError extends AgpRecordError {
  readonly kind = "ordering" as const;

  constructor(
    reason: string,
    lineNumber: number,
    public readonly objectId: string,
    context?: string
  ) {
    super(reason, lineNumber, context);
    this.name = "OrderingError";
  }
}

/**
 * An object's records do not tile its length exactly once
 */
export class CoverageError extends AgpRecordError {
  readonly kind = "coverage" as const;

  constructor(
    reason: string,
    lineNumber: number,
    public readonly objectId: string,
    context?: string
  ) {
    super(reason, lineNumber, context);
    this.name = "CoverageError";
  }
}

/**
 * Object span and component span disagree
 */
export class ConsistencyError extends AgpRecordError {
  readonly kind = "consistency" as const;

  constructor(
    reason: string,
    lineNumber: number,
    public readonly objectLength: number,
    public readonly componentLength: number,
    context?: string
  ) {
    super(reason, lineNumber, context);
    this.name = "ConsistencyError";
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nObject span: ${this.objectLength} bp`;
    msg += `\nComponent span: ${this.componentLength} bp`;
    return msg;
  }
}

/**
 * A component id the sequence provider does not know
 */
export class RetrievalError extends AgpRecordError {
  readonly kind = "retrieval" as const;

  constructor(
    reason: string,
    lineNumber: number,
    public readonly componentId: string,
    context?: string
  ) {
    super(reason, lineNumber, context);
    this.name = "RetrievalError";
  }
}

/**
 * Compression detection errors
 */
export class CompressionError extends AgpError {
  constructor(
    message: string,
    public readonly format: "gzip" | "zstd" | "none",
    public readonly operation: "detect" | "validate",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}`,
      format,
      operation,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors with detailed context
 */
export class FileError extends AgpError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "close" | "seek",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Get helpful suggestion based on system error
   */
  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nFile: ${this.filePath}`;
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends AgpError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer management errors for streaming operations
 */
export class BufferError extends AgpError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "allocate" | "resize" | "overflow" | "underflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

/**
 * Resource limit validation errors
 */
export class ResourceLimitError extends ValidationError {
  constructor(
    message: string,
    public readonly resourceType: "buffer" | "file-size" | "line-length",
    public readonly actualValue: number,
    public readonly maxAllowed: number,
    context?: string
  ) {
    super(message, undefined, context);
    this.name = "ResourceLimitError";
  }

  /**
   * Create error for buffer size violations
   */
  static forBufferSize(actualSize: number, maxSize: number, operation: string): ResourceLimitError {
    const actualMB = Math.round(actualSize / 1_048_576);
    const maxMB = Math.round(maxSize / 1_048_576);

    return new ResourceLimitError(
      `${operation} buffer size too large: ${actualMB}MB (maximum ${maxMB}MB)`,
      "buffer",
      actualSize,
      maxSize,
      `Operation: ${operation}, Actual: ${actualSize} bytes, Max: ${maxSize} bytes`
    );
  }
}

/**
 * Narrow an unknown thrown value to a record error
 */
export function isAgpRecordError(error: unknown): error is AgpRecordError {
  return error instanceof AgpRecordError;
}
