/**
 * Stream processing utilities for line-oriented text and byte data
 *
 * Lines are buffered across chunk boundaries so callers always receive
 * complete lines, whatever the chunk size of the underlying stream.
 */

import { BufferError, StreamError } from "../errors";

const MAX_BUFFER_SIZE = 10_485_760; // 10MB of unterminated text
const LINE_FEED = 0x0a;
const CARRIAGE_RETURN = 0x0d;

/**
 * A raw line and the number of bytes its terminator took
 */
export interface ByteLine {
  /** Line content without the terminator */
  readonly bytes: Uint8Array;
  /** 0 (last line without newline), 1 (`\n`) or 2 (`\r\n`) */
  readonly terminatorLength: number;
}

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Blank lines are yielded like any other line; a final newline does not
 * produce a trailing empty line. `\n` and `\r\n` endings are both accepted.
 *
 * @throws {StreamError} If the stream fails mid-read
 * @throws {BufferError} If an unterminated line grows beyond 10MB
 *
 * @example
 * ```typescript
 * const stream = await createStream("scaffolds.agp");
 * for await (const line of readLines(stream)) {
 *   if (!line.startsWith("#")) console.log(line.split("\t")[0]);
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: "utf8" | "binary" = "utf8"
): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder(encoding === "binary" ? "latin1" : "utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const lines = buffer.split(/\r?\n/);
      buffer = lines.pop() ?? "";
      yield* lines;

      if (buffer.length > MAX_BUFFER_SIZE) {
        throw new BufferError(
          `Buffer overflow: ${buffer.length} bytes exceeds maximum ${MAX_BUFFER_SIZE}`,
          buffer.length,
          "overflow"
        );
      }
    }

    buffer += decoder.decode();
    if (buffer.length > 0) {
      yield buffer;
    }
  } catch (error) {
    if (error instanceof BufferError) throw error;
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    reader.releaseLock();
  }
}

/**
 * Split a byte stream into lines without decoding them
 *
 * Keeps exact byte counts, which index building needs to compute offsets.
 * Chunks are only joined when a line spans several of them.
 *
 * @throws {StreamError} If the stream fails mid-read
 */
export async function* readByteLines(stream: ReadableStream<Uint8Array>): AsyncIterable<ByteLine> {
  const reader = stream.getReader();
  let pending: Uint8Array[] = [];
  let pendingLength = 0;
  let totalBytesProcessed = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      totalBytesProcessed += value.length;
      let lineStart = 0;
      let newline = value.indexOf(LINE_FEED);

      while (newline !== -1) {
        pending.push(value.subarray(lineStart, newline));
        pendingLength += newline - lineStart;
        yield splitTerminator(joinChunks(pending, pendingLength));
        pending = [];
        pendingLength = 0;
        lineStart = newline + 1;
        newline = value.indexOf(LINE_FEED, lineStart);
      }

      if (lineStart < value.length) {
        pending.push(value.subarray(lineStart));
        pendingLength += value.length - lineStart;
      }
    }

    if (pendingLength > 0) {
      yield { bytes: joinChunks(pending, pendingLength), terminatorLength: 0 };
    }
  } catch (error) {
    throw new StreamError(
      `Byte line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    reader.releaseLock();
  }
}

/**
 * Strip a carriage return left before the line feed
 */
function splitTerminator(line: Uint8Array): ByteLine {
  if (line.length > 0 && line[line.length - 1] === CARRIAGE_RETURN) {
    return { bytes: line.subarray(0, line.length - 1), terminatorLength: 2 };
  }
  return { bytes: line, terminatorLength: 1 };
}

function joinChunks(chunks: Uint8Array[], totalLength: number): Uint8Array {
  const [first] = chunks;
  if (chunks.length === 1 && first !== undefined) return first;

  const joined = new Uint8Array(totalLength);
  let offset = 0;
  for (const chunk of chunks) {
    joined.set(chunk, offset);
    offset += chunk.length;
  }
  return joined;
}
