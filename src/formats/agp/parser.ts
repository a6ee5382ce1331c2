/**
 * Streaming AGP parser
 *
 * Drives the line validator over a string, a file or a byte stream and
 * yields records in input order. The first invalid line throws its
 * line-tagged error; records before it have already been yielded.
 */

import { type } from "arktype";
import { ValidationError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines } from "../../io/stream-utils";
import type { FileReaderOptions } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { SUPPORTED_AGP_VERSION } from "./constants";
import {
  type AgpParserOptions,
  AgpParserOptionsSchema,
  type AgpRecord,
  INITIAL_VALIDATOR_STATE,
  type ValidatorState,
} from "./types";
import { readVersionDirective, validateAgpLine } from "./validation";

/**
 * AGP v2.1 parser
 *
 * @example
 * ```typescript
 * const parser = new AgpParser();
 * for await (const record of parser.parseFile("scaffolds.agp")) {
 *   console.log(record.objectId, record.partNumber, record.kind);
 * }
 * ```
 */
export class AgpParser extends AbstractParser<AgpRecord, AgpParserOptions> {
  constructor(options: AgpParserOptions = {}) {
    const validationResult = AgpParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid AGP parser options: ${validationResult.summary}`);
    }
    super(options);
  }

  protected getFormatName(): string {
    return "AGP";
  }

  /**
   * Parse AGP records from a string
   *
   * A trailing newline does not count as an extra (blank) line.
   */
  async *parseString(data: string): AsyncIterable<AgpRecord> {
    const lines = data.split(/\r?\n/);
    if (lines[lines.length - 1] === "") lines.pop();
    yield* this.parseLines(lines);
  }

  /**
   * Parse AGP records from a file using streaming I/O
   *
   * @throws {FileError} When the file cannot be read
   * @throws {AgpRecordError} On the first invalid line
   */
  async *parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<AgpRecord> {
    if (filePath.length === 0) {
      throw new ValidationError("filePath must not be empty");
    }

    const stream = await createStream(filePath, options);
    yield* this.parseLines(readLines(stream, options?.encoding ?? "utf8"));
  }

  /**
   * Parse AGP records from a byte stream
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<AgpRecord> {
    yield* this.parseLines(readLines(stream));
  }

  /**
   * Validate lines in order, numbering them from 1
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<AgpRecord> {
    let state: ValidatorState = INITIAL_VALIDATOR_STATE;
    let lineNumber = 0;

    for await (const line of lines) {
      lineNumber++;
      this.throwIfAborted("record parsing");

      const step = validateAgpLine(line, lineNumber, state, {
        maxLineLength: this.options.maxLineLength,
      });
      state = step.state;

      if (!step.result.success) {
        throw step.result.error;
      }

      const parsed = step.result.value;
      if (parsed.kind === "comment") {
        this.checkVersionDirective(parsed.text, lineNumber);
        continue;
      }

      yield parsed.record;
    }
  }

  private checkVersionDirective(comment: string, lineNumber: number): void {
    const version = readVersionDirective(comment);
    if (version !== undefined && version !== SUPPORTED_AGP_VERSION) {
      this.options.onWarning(
        `AGP version ${version} declared; validating against ${SUPPORTED_AGP_VERSION}`,
        lineNumber
      );
    }
  }
}
