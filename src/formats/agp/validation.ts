/**
 * AGP v2.1 line validation
 *
 * `validateAgpLine` is a pure step function: it takes one raw line and the
 * rolling validator state and returns the next state together with either
 * the parsed line or the first rule it breaks. Cross-line rules (object
 * order, part numbers, coverage) belong to the assembler.
 *
 * Checks run in a fixed order and the first failure wins:
 * line length, comment placement, field count, empty fields, object
 * coordinates, part number, component type, then the component or gap
 * columns, and finally the span comparison.
 */

import {
  CoordinateError,
  ConsistencyError,
  EnumError,
  StructuralError,
} from "../../errors";
import {
  AGP_FIELD_COUNT,
  COMMENT_MARKER,
  COMPONENT_TYPES,
  EVIDENCE_SEPARATOR,
  GAP_TYPES,
  type GapComponentType,
  isGapComponentType,
  isOneOf,
  LINKAGE_EVIDENCE,
  LINKAGE_VALUES,
  type LinkageEvidence,
  ORIENTATIONS,
  type SequenceComponentType,
  UNKNOWN_GAP_LENGTH,
  VERSION_DIRECTIVE,
} from "./constants";
import {
  type AgpComponentRecord,
  type AgpGapRecord,
  type AgpRecord,
  type AgpResult,
  fail,
  INITIAL_VALIDATOR_STATE,
  objectSpan,
  ok,
  type ParsedAgpLine,
  partSpan,
  type ValidatedLine,
  type ValidatorState,
} from "./types";

export const DEFAULT_MAX_LINE_LENGTH = 1_000_000;

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * A body line split into its nine columns
 */
type AgpRow = [string, string, string, string, string, string, string, string, string];

/**
 * Columns 1-4 after validation, before the type-specific columns
 */
interface ObjectFields {
  readonly objectId: string;
  readonly objectBegin: number;
  readonly objectEnd: number;
  readonly partNumber: number;
  readonly lineNumber: number;
}

/**
 * Validate one line of an AGP file
 *
 * @param line - Raw line without its line terminator
 * @param lineNumber - 1-based position of the line in the input
 * @param state - Validator state after the previous line
 *
 * @example
 * ```typescript
 * const { result } = validateAgpLine("scaf1\t1\t10\t1\tW\tctg1\t1\t10\t+", 1);
 * if (result.success && result.value.kind === "record") {
 *   console.log(result.value.record.objectId); // "scaf1"
 * }
 * ```
 */
export function validateAgpLine(
  line: string,
  lineNumber: number,
  state: ValidatorState = INITIAL_VALIDATOR_STATE,
  options: { readonly maxLineLength?: number } = {}
): ValidatedLine {
  const maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
  if (line.length > maxLineLength) {
    return {
      state,
      result: fail(
        new StructuralError(`line too long (${line.length} > ${maxLineLength})`, lineNumber)
      ),
    };
  }

  if (line.startsWith(COMMENT_MARKER)) {
    if (state.pastComments) {
      return {
        state,
        result: fail(new StructuralError("illegal comment in AGP body", lineNumber, line)),
      };
    }
    return { state, result: ok({ kind: "comment", text: line }) };
  }

  const next: ValidatorState = state.pastComments ? state : { pastComments: true };
  return { state: next, result: parseBodyLine(line, lineNumber) };
}

/**
 * Read the version from a `##agp-version` header comment
 *
 * @returns The declared version, or undefined when the comment is not a directive
 */
export function readVersionDirective(comment: string): string | undefined {
  const match = VERSION_DIRECTIVE.exec(comment);
  return match?.[1];
}

/**
 * Parse a non-comment line into a record
 */
function parseBodyLine(line: string, lineNumber: number): AgpResult<ParsedAgpLine> {
  const fields = line.replace(/\s+$/, "").split("\t");

  if (!isAgpRow(fields)) {
    return fail(
      new StructuralError(
        `lines should have ${AGP_FIELD_COUNT} tab delimited fields (found ${fields.length})`,
        lineNumber,
        line
      )
    );
  }

  const emptyColumn = fields.findIndex((field) => field === "");
  if (emptyColumn !== -1) {
    return fail(
      new StructuralError(`detected empty field in column ${emptyColumn + 1}`, lineNumber, line)
    );
  }

  const [objectId, beginText, endText, partText, typeText, col6, col7, col8, col9] = fields;

  const object = parseObjectFields(objectId, beginText, endText, partText, lineNumber);
  if (!object.success) return object;

  if (!isOneOf(COMPONENT_TYPES, typeText)) {
    return fail(
      new EnumError(
        `invalid component type: ${typeText}`,
        lineNumber,
        "component_type",
        typeText
      )
    );
  }

  const record = isGapComponentType(typeText)
    ? parseGapFields(object.value, typeText, col6, col7, col8, col9)
    : parseComponentFields(object.value, typeText, col6, col7, col8, col9);
  if (!record.success) return record;

  const spanCheck = checkSpans(record.value);
  if (!spanCheck.success) return spanCheck;

  return ok({ kind: "record", record: record.value });
}

function isAgpRow(fields: string[]): fields is AgpRow {
  return fields.length === AGP_FIELD_COUNT;
}

function parseInteger(text: string): number | undefined {
  return INTEGER_PATTERN.test(text) ? Number.parseInt(text, 10) : undefined;
}

/**
 * Parse an integer column or fail with a coordinate error naming it
 */
function requireInteger(text: string, column: string, lineNumber: number): AgpResult<number> {
  const value = parseInteger(text);
  if (value === undefined) {
    return fail(new CoordinateError(`${column} '${text}' is not an integer`, lineNumber));
  }
  return ok(value);
}

function parseObjectFields(
  objectId: string,
  beginText: string,
  endText: string,
  partText: string,
  lineNumber: number
): AgpResult<ObjectFields> {
  const objectBegin = requireInteger(beginText, "object_begin", lineNumber);
  if (!objectBegin.success) return objectBegin;

  const objectEnd = requireInteger(endText, "object_end", lineNumber);
  if (!objectEnd.success) return objectEnd;

  if (objectBegin.value < 1 || objectEnd.value < 1) {
    return fail(
      new CoordinateError("object coordinates should be 1-indexed and positive", lineNumber)
    );
  }

  if (objectBegin.value > objectEnd.value) {
    return fail(
      new CoordinateError(
        "beginning object coordinate should be <= the end coordinate",
        lineNumber,
        `object_begin=${objectBegin.value}, object_end=${objectEnd.value}`
      )
    );
  }

  const partNumber = parseInteger(partText);
  if (partNumber === undefined || partNumber < 1) {
    return fail(
      new CoordinateError(
        "part_number should be a positive integer",
        lineNumber,
        `part_number=${partText}`
      )
    );
  }

  return ok({
    objectId,
    objectBegin: objectBegin.value,
    objectEnd: objectEnd.value,
    partNumber,
    lineNumber,
  });
}

function parseComponentFields(
  object: ObjectFields,
  componentType: SequenceComponentType,
  componentId: string,
  beginText: string,
  endText: string,
  orientationText: string
): AgpResult<AgpComponentRecord> {
  const { lineNumber } = object;

  const componentBegin = requireInteger(beginText, "component_begin", lineNumber);
  if (!componentBegin.success) return componentBegin;

  const componentEnd = requireInteger(endText, "component_end", lineNumber);
  if (!componentEnd.success) return componentEnd;

  if (componentBegin.value < 1 || componentEnd.value < 1) {
    return fail(
      new CoordinateError("component coordinates should be 1-indexed and positive", lineNumber)
    );
  }

  if (componentBegin.value > componentEnd.value) {
    return fail(
      new CoordinateError(
        "beginning component coordinate should be less than or equal to the end coordinate",
        lineNumber,
        `component_begin=${componentBegin.value}, component_end=${componentEnd.value}`
      )
    );
  }

  if (!isOneOf(ORIENTATIONS, orientationText)) {
    return fail(
      new EnumError(
        `invalid orientation: ${orientationText}`,
        lineNumber,
        "orientation",
        orientationText
      )
    );
  }

  return ok({
    ...object,
    kind: "component",
    componentType,
    componentId,
    componentBegin: componentBegin.value,
    componentEnd: componentEnd.value,
    orientation: orientationText,
  });
}

function parseGapFields(
  object: ObjectFields,
  componentType: GapComponentType,
  lengthText: string,
  gapTypeText: string,
  linkageText: string,
  evidenceText: string
): AgpResult<AgpGapRecord> {
  const { lineNumber } = object;

  const gapLength = requireInteger(lengthText, "gap_length", lineNumber);
  if (!gapLength.success) return gapLength;

  if (!isOneOf(GAP_TYPES, gapTypeText)) {
    return fail(
      new EnumError(`invalid gap type: ${gapTypeText}`, lineNumber, "gap_type", gapTypeText)
    );
  }

  if (!isOneOf(LINKAGE_VALUES, linkageText)) {
    return fail(
      new EnumError(`invalid linkage field: ${linkageText}`, lineNumber, "linkage", linkageText)
    );
  }

  if (gapLength.value < 1) {
    return fail(new CoordinateError("gap length must be >0", lineNumber));
  }

  if (componentType === "U" && gapLength.value !== UNKNOWN_GAP_LENGTH) {
    return fail(
      new CoordinateError(
        `gaps of type 'U' must be ${UNKNOWN_GAP_LENGTH} bp`,
        lineNumber,
        `gap_length=${gapLength.value}`
      )
    );
  }

  const linkageEvidence: LinkageEvidence[] = [];
  for (const token of evidenceText.split(EVIDENCE_SEPARATOR)) {
    if (!isOneOf(LINKAGE_EVIDENCE, token)) {
      return fail(
        new EnumError(
          `invalid linkage evidence: ${token}`,
          lineNumber,
          "linkage_evidence",
          token
        )
      );
    }
    linkageEvidence.push(token);
  }

  return ok({
    ...object,
    kind: "gap",
    componentType,
    gapLength: gapLength.value,
    gapType: gapTypeText,
    linkage: linkageText,
    linkageEvidence,
  });
}

/**
 * Object span must equal the component span or gap length
 */
function checkSpans(record: AgpRecord): AgpResult<AgpRecord> {
  const objectLength = objectSpan(record);
  const componentLength = partSpan(record);

  if (objectLength !== componentLength) {
    return fail(
      new ConsistencyError(
        "object and component coordinates have inconsistent lengths",
        record.lineNumber,
        objectLength,
        componentLength
      )
    );
  }

  return ok(record);
}
