/**
 * FASTA output
 *
 * Assembled objects arrive as a header followed by sequence pieces of
 * arbitrary size, so the writer is incremental: it tracks the open line and
 * its column, wraps at `lineWidth` when asked to, and never emits an empty
 * line.
 */

import type { WritableStream } from "node:stream/web";
import { type } from "arktype";
import { ValidationError } from "../errors";

/**
 * FASTA writer options
 */
export interface FastaWriterOptions {
  /** Bases per line; 0 writes each object's sequence on one line (default: 0) */
  readonly lineWidth?: number;
}

const FastaWriterOptionsSchema = type({
  "lineWidth?": "number.integer>=0",
});

/**
 * Incremental FASTA writer
 *
 * Each method returns the text to append to the output; the writer itself
 * holds no output buffer.
 *
 * @example
 * ```typescript
 * const writer = new FastaStreamWriter({ lineWidth: 4 });
 * let out = writer.beginRecord("scaf1");
 * out += writer.appendSequence("ACGTAC");
 * out += writer.finish();
 * // ">scaf1\nACGT\nAC\n"
 * ```
 */
export class FastaStreamWriter {
  private readonly lineWidth: number;
  private column = 0;
  private lineOpen = false;
  private recordCount = 0;

  constructor(options: FastaWriterOptions = {}) {
    const validationResult = FastaWriterOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA writer options: ${validationResult.summary}`);
    }
    this.lineWidth = options.lineWidth ?? 0;
  }

  /**
   * Number of headers written so far
   */
  get records(): number {
    return this.recordCount;
  }

  /**
   * Start a new record, closing the previous sequence line
   */
  beginRecord(id: string): string {
    const prefix = this.lineOpen ? "\n" : "";
    this.column = 0;
    this.lineOpen = false;
    this.recordCount++;
    return `${prefix}>${id}\n`;
  }

  /**
   * Append sequence text to the current record
   */
  appendSequence(text: string): string {
    if (text.length === 0) return "";
    this.lineOpen = true;

    if (this.lineWidth === 0) {
      this.column += text.length;
      return text;
    }

    const pieces: string[] = [];
    let offset = 0;
    while (offset < text.length) {
      if (this.column === this.lineWidth) {
        pieces.push("\n");
        this.column = 0;
      }
      const take = Math.min(this.lineWidth - this.column, text.length - offset);
      pieces.push(text.slice(offset, offset + take));
      this.column += take;
      offset += take;
    }
    return pieces.join("");
  }

  /**
   * Terminate the output with a single newline
   */
  finish(): string {
    this.lineOpen = false;
    this.column = 0;
    return "\n";
  }
}

/**
 * Write text chunks to a WritableStream in order
 *
 * The writer lock is released afterwards; the stream itself stays open.
 */
export async function writeToStream(
  chunks: AsyncIterable<string>,
  stream: WritableStream<Uint8Array>
): Promise<void> {
  const writer = stream.getWriter();
  const encoder = new TextEncoder();

  try {
    for await (const chunk of chunks) {
      await writer.write(encoder.encode(chunk));
    }
  } finally {
    writer.releaseLock();
  }
}
