/**
 * AGP assembly: validated records in, FASTA text out
 *
 * The fold is split in two. {@link planRecord} is pure: it checks object
 * ordering, part continuity and coverage and says what to emit.
 * {@link assembleFasta} resolves those emissions against a
 * {@link SequenceProvider} and writes them through a FASTA writer.
 *
 * @module assemble
 */

import { type } from "arktype";
import { HashSet } from "effect";
import {
  ConsistencyError,
  CoverageError,
  OrderingError,
  RetrievalError,
  ValidationError,
} from "../errors";
import { InterruptHandler } from "../formats/abstract-parser";
import { GAP_CHARACTER } from "../formats/agp/constants";
import { type AgpRecord, type AgpResult, fail, ok, partSpan } from "../formats/agp/types";
import { FastaStreamWriter } from "../formats/fasta";
import type { WarningHandler } from "../types";
import { findCoverageDefect, type Interval, toInterval } from "./core/coverage";
import { reverseComplement } from "./core/sequence-manipulation";
import type { SequenceProvider, SequenceRange } from "./core/sequence-provider";

/**
 * Assembly options
 */
export interface AssembleOptions {
  /**
   * Slice each component by its begin/end columns and fail when the range
   * runs past the component. Off by default: the whole component sequence
   * is written, whatever the columns say.
   */
  readonly strict?: boolean;
  /** Bases per output line; 0 keeps each object on one line (default: 0) */
  readonly lineWidth?: number;
  readonly signal?: AbortSignal;
  readonly onWarning?: WarningHandler;
}

const AssembleOptionsSchema = type({
  "strict?": "boolean",
  "lineWidth?": "number.integer>=0",
});

/**
 * Fold state carried from one record to the next
 *
 * A step never changes the state it is given, so any earlier state can be
 * replayed.
 */
export interface AssemblyState {
  readonly currentObjectId: string | null;
  readonly previousPartNumber: number;
  readonly intervals: readonly Interval[];
  readonly objectCount: number;
  readonly seenObjects: HashSet.HashSet<string>;
}

export function initialAssemblyState(): AssemblyState {
  return {
    currentObjectId: null,
    previousPartNumber: 0,
    intervals: [],
    objectCount: 0,
    seenObjects: HashSet.empty<string>(),
  };
}

/**
 * Output planned for one record
 */
export type AssemblyEmission =
  | { readonly kind: "header"; readonly objectId: string }
  | {
      readonly kind: "component";
      readonly componentId: string;
      readonly reverse: boolean;
      /** Set in strict mode only */
      readonly range?: SequenceRange;
      /** Span declared by the AGP line */
      readonly span: number;
      readonly lineNumber: number;
    }
  | { readonly kind: "gap"; readonly length: number };

export interface AssemblyStep {
  readonly state: AssemblyState;
  readonly emissions: readonly AssemblyEmission[];
}

function coverageError(
  objectId: string,
  intervals: readonly Interval[],
  lineNumber: number
): CoverageError | undefined {
  const defect = findCoverageDefect(intervals);
  if (defect === undefined) return undefined;
  return new CoverageError(
    `some positions in ${objectId} are not accounted for or overlap`,
    lineNumber,
    objectId,
    `${defect.kind} of ${defect.length} bp at position ${defect.position}`
  );
}

/**
 * Fold one record into the assembly state
 *
 * Checks run in this order: a new object must start at 1, must not have
 * been seen before, and the object it replaces must be fully covered; then
 * part numbers must go up by exactly one.
 */
export function planRecord(
  state: AssemblyState,
  record: AgpRecord,
  options: { strict?: boolean } = {}
): AgpResult<AssemblyStep> {
  const { lineNumber, objectId } = record;
  const emissions: AssemblyEmission[] = [];
  const opensObject = objectId !== state.currentObjectId;

  if (opensObject) {
    if (record.objectBegin !== 1) {
      return fail(new OrderingError("all objects should start with '1'", lineNumber, objectId));
    }
    if (HashSet.has(state.seenObjects, objectId)) {
      return fail(new OrderingError("object identifier out of order", lineNumber, objectId));
    }
    if (state.currentObjectId !== null) {
      const error = coverageError(state.currentObjectId, state.intervals, lineNumber);
      if (error !== undefined) return fail(error);
    }
    emissions.push({ kind: "header", objectId });
  }

  const previousPartNumber = opensObject ? 0 : state.previousPartNumber;
  if (record.partNumber - previousPartNumber !== 1) {
    return fail(new OrderingError("non-sequential part_numbers", lineNumber, objectId));
  }

  const interval = toInterval(record.objectBegin, record.objectEnd);
  const next: AssemblyState = opensObject
    ? {
        currentObjectId: objectId,
        previousPartNumber: record.partNumber,
        intervals: [interval],
        objectCount: state.objectCount + 1,
        seenObjects: HashSet.add(state.seenObjects, objectId),
      }
    : {
        ...state,
        previousPartNumber: record.partNumber,
        intervals: [...state.intervals, interval],
      };

  if (record.kind === "gap") {
    emissions.push({ kind: "gap", length: record.gapLength });
  } else {
    emissions.push({
      kind: "component",
      componentId: record.componentId,
      reverse: record.orientation === "-",
      ...(options.strict === true
        ? { range: { start: record.componentBegin, end: record.componentEnd } }
        : {}),
      span: partSpan(record),
      lineNumber,
    });
  }

  return ok({ state: next, emissions });
}

/**
 * Check the coverage of the last object once input runs out
 */
export function finishAssembly(state: AssemblyState, lineNumber: number): AgpResult<AssemblyState> {
  if (state.currentObjectId === null) return ok(state);
  const error = coverageError(state.currentObjectId, state.intervals, lineNumber);
  return error === undefined ? ok(state) : fail(error);
}

/**
 * Fetch, slice and orient the bases of one component
 *
 * @throws {RetrievalError} When the provider does not know the component
 * @throws {ConsistencyError} In strict mode, when the range runs past the component
 */
async function resolveComponent(
  emission: Extract<AssemblyEmission, { kind: "component" }>,
  provider: SequenceProvider,
  onWarning: WarningHandler
): Promise<string> {
  const { componentId, lineNumber, range, span } = emission;

  if (!(await provider.has(componentId))) {
    throw new RetrievalError(
      `component ${componentId} not found in the component sequences`,
      lineNumber,
      componentId
    );
  }

  let sequence: string;
  if (range !== undefined) {
    const length = (await provider.getLength(componentId)) ?? 0;
    if (range.end > length) {
      throw new ConsistencyError(
        `component_end ${range.end} is past the end of ${componentId} (${length} bp)`,
        lineNumber,
        span,
        length
      );
    }
    sequence = await provider.fetch(componentId, range);
  } else {
    sequence = await provider.fetch(componentId);
    if (sequence.length !== span) {
      onWarning(
        `component ${componentId} is ${sequence.length} bp but the line spans ${span} bp; writing the whole component`,
        lineNumber
      );
    }
  }

  return emission.reverse ? reverseComplement(sequence) : sequence;
}

async function renderEmission(
  emission: AssemblyEmission,
  writer: FastaStreamWriter,
  provider: SequenceProvider,
  onWarning: WarningHandler
): Promise<string> {
  switch (emission.kind) {
    case "header":
      return writer.beginRecord(emission.objectId);
    case "gap":
      return writer.appendSequence(GAP_CHARACTER.repeat(emission.length));
    case "component":
      return writer.appendSequence(await resolveComponent(emission, provider, onWarning));
  }
}

const defaultWarning: WarningHandler = (warning, lineNumber) => {
  console.warn(`AGP Warning (line ${lineNumber}): ${warning}`);
};

/**
 * Assemble FASTA text from AGP records
 *
 * Text is yielded as soon as each record is resolved. The first error is
 * thrown after everything before it has been yielded.
 *
 * @throws {AgpRecordError} On the first ordering, coverage, retrieval or consistency failure
 * @throws {ParseError} When the signal aborts
 *
 * @example
 * ```typescript
 * const records = new AgpParser().parseFile("scaffolds.agp");
 * const provider = await FaidxSequenceProvider.open("contigs.fasta");
 * for await (const chunk of assembleFasta(records, provider, { lineWidth: 60 })) {
 *   process.stdout.write(chunk);
 * }
 * ```
 */
export async function* assembleFasta(
  records: Iterable<AgpRecord> | AsyncIterable<AgpRecord>,
  provider: SequenceProvider,
  options: AssembleOptions = {}
): AsyncIterable<string> {
  const validationResult = AssembleOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid assembly options: ${validationResult.summary}`);
  }

  const strict = options.strict ?? false;
  const onWarning = options.onWarning ?? defaultWarning;
  const interrupt = new InterruptHandler(options.signal);
  const writer = new FastaStreamWriter({ lineWidth: options.lineWidth ?? 0 });

  let state = initialAssemblyState();
  let lastLineNumber = 0;

  for await (const record of records) {
    interrupt.throwIfAborted("AGP assembly");
    lastLineNumber = record.lineNumber;

    const step = planRecord(state, record, { strict });
    if (!step.success) throw step.error;
    state = step.value.state;

    for (const emission of step.value.emissions) {
      const text = await renderEmission(emission, writer, provider, onWarning);
      if (text.length > 0) yield text;
    }
  }

  const finished = finishAssembly(state, lastLineNumber);
  if (!finished.success) throw finished.error;

  yield writer.finish();
}

