/**
 * FASTA indexing and random access (faidx)
 *
 * Reads a samtools-style `.fai` index when one sits beside the FASTA file
 * and otherwise builds the same index in memory by scanning the file once.
 * The index is never written to disk.
 *
 * @module operations/faidx
 */

import { type } from "arktype";
import { CompressionDetector } from "../compression/detector";
import { CompressionError, ParseError, ValidationError } from "../errors";
import { createStream, exists, getSize, readByteRange, readToString } from "../io/file-reader";
import { readByteLines } from "../io/stream-utils";
import type { FastaSequence } from "../types";

/**
 * ArkType schema for validating FaidxRecord data
 *
 * Empty sequences carry zero line lengths; any other record needs at least
 * one base per line and room for the newline in `linewidth`.
 */
const FaidxRecordSchema = type({
  name: "string>0",
  length: "number.integer>=0",
  offset: "number.integer>=0",
  linebases: "number.integer>=0",
  linewidth: "number.integer>=0",
}).narrow((record, ctx) => {
  if (record.length > 0 && record.linebases < 1) {
    return ctx.reject({
      expected: "linebases >= 1 for a non-empty sequence",
      actual: `linebases=${record.linebases}`,
      path: ["linebases"],
    });
  }
  if (record.linewidth < record.linebases) {
    return ctx.reject({
      expected: "linewidth >= linebases (linewidth includes newline bytes)",
      actual: `linewidth=${record.linewidth}, linebases=${record.linebases}`,
      path: ["linewidth"],
    });
  }
  return true;
});

/**
 * ArkType schema for validating Faidx initialization options
 */
const FaidxOptionsSchema = type({
  "fullHeader?": "boolean",
});

/**
 * Options for Faidx initialization
 */
export type FaidxOptions = typeof FaidxOptionsSchema.infer;

/**
 * FASTA index entry, one per sequence
 *
 * Matches the five columns of a samtools `.fai` file.
 */
export interface FaidxRecord {
  /** Sequence identifier (or full header with fullHeader option) */
  name: string;
  /** Total sequence length in bases */
  length: number;
  /** Byte offset of the first base */
  offset: number;
  /** Bases per full sequence line */
  linebases: number;
  /** Bytes per full sequence line, newline included */
  linewidth: number;
}

/**
 * 1-based inclusive region of a sequence
 */
export interface FaidxRange {
  readonly start: number;
  readonly end: number;
}

const GREATER_THAN = 0x3e;
const CARRIAGE_RETURN_OR_NEWLINE = /\r?\n/g;

/**
 * Index record under construction while scanning a FASTA file
 */
interface PendingRecord {
  name: string;
  offset: number;
  length: number;
  linebases: number;
  linewidth: number;
  /** Set once a line shorter than `linebases` has been seen */
  shortLineAt?: number;
}

/**
 * FASTA index builder and manager
 *
 * Builds the in-memory index from a FASTA file or loads an existing
 * `.fai`. Use {@link Faidx} for sequence extraction.
 */
export class FaiBuilder {
  private readonly records = new Map<string, FaidxRecord>();

  constructor(private readonly fastaPath: string) {}

  /**
   * Get index record by sequence ID
   */
  get(seqId: string): FaidxRecord | undefined {
    return this.records.get(seqId);
  }

  /**
   * Get all sequence IDs in file order
   */
  getSequenceIds(): string[] {
    return Array.from(this.records.keys());
  }

  has(seqId: string): boolean {
    return this.records.has(seqId);
  }

  size(): number {
    return this.records.size;
  }

  /**
   * Build the index by streaming the FASTA file
   *
   * Byte offsets account for `\r\n` line endings. Every sequence line but
   * the last must hold the same number of bases, as random access assumes.
   *
   * @throws {ParseError} On ragged line lengths or duplicate sequence names
   */
  async build(options: { fullHeader?: boolean } = {}): Promise<void> {
    const fullHeader = options.fullHeader ?? false;

    if (!(await exists(this.fastaPath))) {
      throw new ParseError(`FASTA file not found: ${this.fastaPath}`, "FASTA");
    }

    const decoder = new TextDecoder();
    const stream = await createStream(this.fastaPath);

    this.records.clear();
    let byteOffset = 0;
    let lineNumber = 0;
    let current: PendingRecord | undefined;

    for await (const { bytes, terminatorLength } of readByteLines(stream)) {
      lineNumber++;
      const lineBytes = bytes.length + terminatorLength;

      if (bytes[0] === GREATER_THAN) {
        if (current !== undefined) this.commit(current, lineNumber);

        const header = decoder.decode(bytes.subarray(1)).trim();
        const name = fullHeader ? header : (header.split(/\s+/)[0] ?? header);
        current = { name, offset: byteOffset + lineBytes, length: 0, linebases: 0, linewidth: 0 };
      } else if (current !== undefined && bytes.length > 0) {
        if (current.shortLineAt !== undefined) {
          throw new ParseError(
            `Different line length in sequence '${current.name}'`,
            "FASTA",
            current.shortLineAt,
            "Random access needs every sequence line but the last to hold the same number of bases"
          );
        }

        if (current.linebases === 0) {
          // blank lines may sit between the header and the first bases
          current.offset = byteOffset;
          current.linebases = bytes.length;
          current.linewidth = lineBytes;
        } else if (bytes.length > current.linebases) {
          throw new ParseError(
            `Different line length in sequence '${current.name}'`,
            "FASTA",
            lineNumber
          );
        }

        if (bytes.length < current.linebases || lineBytes < current.linewidth) {
          current.shortLineAt = lineNumber;
        }
        current.length += bytes.length;
      } else if (current !== undefined && current.length > 0) {
        current.shortLineAt ??= lineNumber;
      }

      byteOffset += lineBytes;
    }

    if (current !== undefined) this.commit(current, lineNumber);
  }

  /**
   * Load index from an existing `.fai` file
   *
   * @throws {ParseError} On malformed lines
   */
  async load(faiPath: string): Promise<void> {
    if (!(await exists(faiPath))) {
      throw new ParseError(`Index file not found: ${faiPath}`, "fai");
    }

    const content = await readToString(faiPath);
    const lines = content.split(/\r?\n/);

    this.records.clear();

    for (const [index, line] of lines.entries()) {
      if (line.trim() === "") continue;

      const parts = line.split("\t");
      const [name, lengthStr, offsetStr, linebasesStr, linewidthStr] = parts;

      if (
        parts.length !== 5 ||
        name === undefined ||
        lengthStr === undefined ||
        offsetStr === undefined ||
        linebasesStr === undefined ||
        linewidthStr === undefined
      ) {
        throw new ParseError(
          `Invalid .fai format: expected 5 columns, got ${parts.length}`,
          "fai",
          index + 1,
          line
        );
      }

      const record = {
        name,
        length: Number(lengthStr),
        offset: Number(offsetStr),
        linebases: Number(linebasesStr),
        linewidth: Number(linewidthStr),
      };

      const validated = FaidxRecordSchema(record);
      if (validated instanceof type.errors) {
        throw new ParseError(`Invalid .fai record: ${validated.summary}`, "fai", index + 1, line);
      }

      this.records.set(validated.name, validated);
    }
  }

  private commit(pending: PendingRecord, lineNumber: number): void {
    if (this.records.has(pending.name)) {
      throw new ParseError(`Duplicate sequence name '${pending.name}'`, "FASTA", lineNumber);
    }
    const { shortLineAt: _shortLineAt, ...record } = pending;
    this.records.set(record.name, record);
  }
}

/**
 * FASTA random access and sequence extraction
 *
 * @example
 * ```typescript
 * const faidx = new Faidx("components.fasta");
 * await faidx.init();
 *
 * const ctg1 = await faidx.extract("ctg1");
 * const slice = await faidx.extract("ctg1", { start: 101, end: 200 });
 * ```
 */
export class Faidx {
  private readonly builder: FaiBuilder;
  private readonly options: FaidxOptions;

  constructor(
    private readonly fastaPath: string,
    options: FaidxOptions = {}
  ) {
    const validated = FaidxOptionsSchema(options);
    if (validated instanceof type.errors) {
      throw new ValidationError(`Invalid Faidx options: ${validated.summary}`);
    }
    this.options = validated;
    this.builder = new FaiBuilder(fastaPath);
  }

  /**
   * Initialize the index
   *
   * Loads `<fasta>.fai` when present; otherwise builds the index in memory.
   * A full-header index is always built, since a `.fai` keys on the first
   * word of each header.
   *
   * @throws {CompressionError} If the FASTA file is gzip or zstd compressed
   */
  async init(): Promise<void> {
    await this.rejectCompressed();

    const faiPath = this.getFaiPath();
    if (this.options.fullHeader !== true && (await exists(faiPath))) {
      await this.builder.load(faiPath);
    } else {
      await this.builder.build({ fullHeader: this.options.fullHeader ?? false });
    }
  }

  has(seqId: string): boolean {
    return this.builder.has(seqId);
  }

  /**
   * Sequence length, or undefined when the sequence is not indexed
   */
  getLength(seqId: string): number | undefined {
    return this.builder.get(seqId)?.length;
  }

  getSequenceIds(): string[] {
    return this.builder.getSequenceIds();
  }

  /**
   * Extract a whole sequence or a 1-based inclusive range of it
   *
   * @throws {ValidationError} If the sequence is unknown or the range is out of bounds
   */
  async extract(seqId: string, range?: FaidxRange): Promise<FastaSequence> {
    const record = this.builder.get(seqId);

    if (record === undefined) {
      const available = this.builder.getSequenceIds();
      throw new ValidationError(
        `Sequence "${seqId}" not found in index. Available sequences: ${available.slice(0, 5).join(", ")}${available.length > 5 ? "..." : ""}`
      );
    }

    const start = range?.start ?? 1;
    const end = range?.end ?? record.length;

    if (record.length === 0 && range === undefined) {
      return { format: "fasta", id: seqId, sequence: "", length: 0 };
    }

    validateCoordinates(start, end, seqId, record.length);
    const sequence = await this.extractSubsequence(record, start, end);

    return {
      format: "fasta",
      id: range === undefined ? seqId : `${seqId}:${start}-${end}`,
      sequence,
      length: sequence.length,
    };
  }

  /**
   * Read bases between two 1-based positions using the index offsets
   */
  private async extractSubsequence(
    record: FaidxRecord,
    start: number,
    end: number
  ): Promise<string> {
    const { startByte, endByte } = calculateByteRange(start, end, record);
    const rawBytes = await readByteRange(this.fastaPath, startByte, endByte);
    return new TextDecoder().decode(rawBytes).replace(CARRIAGE_RETURN_OR_NEWLINE, "");
  }

  private async rejectCompressed(): Promise<void> {
    const size = (await exists(this.fastaPath)) ? await getSize(this.fastaPath) : 0;
    const header = size > 0 ? await readByteRange(this.fastaPath, 0, Math.min(4, size)) : undefined;
    const detection = CompressionDetector.hybrid(this.fastaPath, header);

    if (detection.format !== "none") {
      throw new CompressionError(
        `FASTA file appears to be compressed (${detection.format}); ` +
          `random access needs an uncompressed file. Decompress ${this.fastaPath} first`,
        detection.format,
        "validate",
        `Detected by ${detection.detectionMethod}`
      );
    }
  }

  private getFaiPath(): string {
    return `${this.fastaPath}.fai`;
  }
}

/**
 * Convert 1-based inclusive positions to a byte range in the FASTA file
 */
function calculateByteRange(
  start: number,
  end: number,
  record: FaidxRecord
): { startByte: number; endByte: number } {
  const start0 = start - 1;
  const end0 = end - 1;

  const startLine = Math.floor(start0 / record.linebases);
  const endLine = Math.floor(end0 / record.linebases);

  const startByte = record.offset + startLine * record.linewidth + (start0 % record.linebases);
  const endByte = record.offset + endLine * record.linewidth + (end0 % record.linebases) + 1;

  return { startByte, endByte };
}

/**
 * @throws {ValidationError} If the range falls outside the sequence
 */
function validateCoordinates(start: number, end: number, seqId: string, seqLength: number): void {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new ValidationError(`Coordinates for "${seqId}" must be integers`);
  }

  if (start < 1) {
    throw new ValidationError(
      `Start position ${start} is less than 1 for sequence "${seqId}". Coordinates are 1-based.`
    );
  }

  if (end > seqLength) {
    throw new ValidationError(
      `End position ${end} exceeds sequence length ${seqLength} for "${seqId}". ` +
        `Valid coordinates are 1-${seqLength}.`
    );
  }

  if (start > end) {
    throw new ValidationError(
      `Invalid range: start (${start}) > end (${end}) for sequence "${seqId}".`
    );
  }
}
