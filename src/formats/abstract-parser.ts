/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Gives every line-oriented parser the same AbortSignal support and the same
 * default warning sink without imposing how lines are parsed.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions, WarningHandler } from "../types";

/**
 * Parser options after defaults are applied
 */
export type ResolvedParserOptions<TOptions extends ParserOptions> = TOptions & {
  maxLineLength: number;
  onWarning: WarningHandler;
};

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: ResolvedParserOptions<TOptions>;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    const formatName = this.getFormatName();
    this.options = {
      ...options,
      maxLineLength: options.maxLineLength ?? 1_000_000,
      onWarning:
        options.onWarning ??
        ((warning: string, lineNumber?: number): void => {
          console.warn(`${formatName} Warning (line ${lineNumber}): ${warning}`);
        }),
    };
    this.interruptHandler = new InterruptHandler(options.signal);
  }

  // ============================================================================
  // SHARED INTERRUPT HANDLING
  // ============================================================================

  /**
   * Check abortion with format context
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  // ============================================================================
  // ABSTRACT METHODS
  // ============================================================================

  /**
   * Parse records from an in-memory string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file using streaming I/O
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier used in messages (e.g. "AGP")
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal integration shared by format parsers
 */
export class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If operation was aborted, naming where it stopped
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
