/**
 * AGP record types and parser options
 */

import { type } from "arktype";
import type { AgpRecordError } from "../../errors";
import type { ParserOptions } from "../../types";
import type {
  GapComponentType,
  GapType,
  Linkage,
  LinkageEvidence,
  Orientation,
  SequenceComponentType,
} from "./constants";

/**
 * Result of a step that can fail with a line-tagged AGP error
 *
 * Same shape as the parse results used by the index code, specialised to
 * record errors so callers can switch on `error.kind`.
 */
export type AgpResult<T, E extends AgpRecordError = AgpRecordError> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

export function ok<T>(value: T): { readonly success: true; readonly value: T } {
  return { success: true, value };
}

export function fail<E extends AgpRecordError>(error: E): { readonly success: false; readonly error: E } {
  return { success: false, error };
}

/**
 * Columns 1-4, shared by every body line
 */
interface AgpRecordBase {
  /** Identifier of the assembled object (scaffold, chromosome) */
  readonly objectId: string;
  /** 1-based inclusive start on the object */
  readonly objectBegin: number;
  /** 1-based inclusive end on the object */
  readonly objectEnd: number;
  /** 1-based index of the line within its object */
  readonly partNumber: number;
  /** 1-based input line the record came from */
  readonly lineNumber: number;
}

/**
 * A body line that places sequence from a component
 */
export interface AgpComponentRecord extends AgpRecordBase {
  readonly kind: "component";
  readonly componentType: SequenceComponentType;
  readonly componentId: string;
  readonly componentBegin: number;
  readonly componentEnd: number;
  readonly orientation: Orientation;
}

/**
 * A body line that describes a gap
 */
export interface AgpGapRecord extends AgpRecordBase {
  readonly kind: "gap";
  readonly componentType: GapComponentType;
  readonly gapLength: number;
  readonly gapType: GapType;
  readonly linkage: Linkage;
  readonly linkageEvidence: readonly LinkageEvidence[];
}

export type AgpRecord = AgpComponentRecord | AgpGapRecord;

/**
 * What a single input line turned out to be
 */
export type ParsedAgpLine =
  | { readonly kind: "comment"; readonly text: string }
  | { readonly kind: "record"; readonly record: AgpRecord };

/**
 * Rolling state of the line validator
 *
 * Only remembers whether a body line has been seen, since comments are
 * legal in the header alone.
 */
export interface ValidatorState {
  readonly pastComments: boolean;
}

export const INITIAL_VALIDATOR_STATE: ValidatorState = { pastComments: false };

/**
 * Output of one validator step
 */
export interface ValidatedLine {
  readonly state: ValidatorState;
  readonly result: AgpResult<ParsedAgpLine>;
}

/**
 * AGP parser options
 */
export interface AgpParserOptions extends ParserOptions {}

/**
 * Validation schema for AGP parser options
 */
export const AgpParserOptionsSchema = type({
  "maxLineLength?": "number.integer>0",
});

/**
 * Object span in bases (inclusive coordinates)
 */
export function objectSpan(record: AgpRecord): number {
  return record.objectEnd - record.objectBegin + 1;
}

/**
 * Component or gap span in bases
 */
export function partSpan(record: AgpRecord): number {
  return record.kind === "gap"
    ? record.gapLength
    : record.componentEnd - record.componentBegin + 1;
}
