/**
 * Component sequence sources for assembly
 *
 * The assembler only needs to ask whether a component exists, how long it
 * is and what its bases are. Indexed FASTA files and plain maps both fit.
 *
 * @module sequence-provider
 */

import { ValidationError } from "../../errors";
import { Faidx, type FaidxOptions } from "../faidx";

/**
 * 1-based inclusive region of a component
 */
export interface SequenceRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Random access to named component sequences
 */
export interface SequenceProvider {
  has(id: string): Promise<boolean>;
  /** Length in bases, or undefined for an unknown id */
  getLength(id: string): Promise<number | undefined>;
  /**
   * Bases of a component, whole or in part
   *
   * @throws {ValidationError} For an unknown id or an out-of-bounds range
   */
  fetch(id: string, range?: SequenceRange): Promise<string>;
}

/**
 * Provider over sequences held in memory
 *
 * @example
 * ```typescript
 * const provider = new InMemorySequenceProvider({ ctg1: "ACGTACGTAC" });
 * await provider.fetch("ctg1", { start: 3, end: 6 }); // "GTAC"
 * ```
 */
export class InMemorySequenceProvider implements SequenceProvider {
  private readonly sequences: ReadonlyMap<string, string>;

  constructor(sequences: ReadonlyMap<string, string> | Readonly<Record<string, string>>) {
    this.sequences =
      sequences instanceof Map ? new Map(sequences) : new Map(Object.entries(sequences));
  }

  async has(id: string): Promise<boolean> {
    return this.sequences.has(id);
  }

  async getLength(id: string): Promise<number | undefined> {
    return this.sequences.get(id)?.length;
  }

  async fetch(id: string, range?: SequenceRange): Promise<string> {
    const sequence = this.sequences.get(id);
    if (sequence === undefined) {
      throw new ValidationError(`Sequence "${id}" not found`);
    }
    if (range === undefined) return sequence;

    if (range.start < 1 || range.end > sequence.length || range.start > range.end) {
      throw new ValidationError(
        `Range ${range.start}-${range.end} is outside "${id}" (length ${sequence.length})`
      );
    }
    return sequence.slice(range.start - 1, range.end);
  }
}

/**
 * Provider over an indexed FASTA file
 *
 * @example
 * ```typescript
 * const provider = await FaidxSequenceProvider.open("contigs.fasta");
 * const bases = await provider.fetch("ctg1");
 * ```
 */
export class FaidxSequenceProvider implements SequenceProvider {
  private constructor(private readonly faidx: Faidx) {}

  /**
   * Index the FASTA file (or load its `.fai`) and wrap it
   */
  static async open(fastaPath: string, options: FaidxOptions = {}): Promise<FaidxSequenceProvider> {
    const faidx = new Faidx(fastaPath, options);
    await faidx.init();
    return new FaidxSequenceProvider(faidx);
  }

  async has(id: string): Promise<boolean> {
    return this.faidx.has(id);
  }

  async getLength(id: string): Promise<number | undefined> {
    return this.faidx.getLength(id);
  }

  async fetch(id: string, range?: SequenceRange): Promise<string> {
    const extracted = await this.faidx.extract(id, range);
    return extracted.sequence;
  }
}
