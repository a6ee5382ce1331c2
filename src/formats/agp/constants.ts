/**
 * Controlled vocabularies and fixed values of the AGP v2.1 format
 *
 * Each table is an `as const` tuple so the union type of its values is
 * derived from the data; `isOneOf` narrows a raw field to that union.
 * Values follow NCBI's AGP v2.1 format definition.
 */

// ============================================================================
// COMPONENT TYPES (column 5)
// ============================================================================

/**
 * Component types that place sequence in the object
 *
 * A active finishing, D draft HTG, F finished HTG, G whole genome finishing,
 * O other sequence, P pre-draft, W WGS contig
 */
export const SEQUENCE_COMPONENT_TYPES = ["A", "D", "F", "G", "O", "P", "W"] as const;

/**
 * Component types that describe a gap: N (specified size), U (unknown size)
 */
export const GAP_COMPONENT_TYPES = ["N", "U"] as const;

export const COMPONENT_TYPES = [...SEQUENCE_COMPONENT_TYPES, ...GAP_COMPONENT_TYPES] as const;

export type SequenceComponentType = (typeof SEQUENCE_COMPONENT_TYPES)[number];
export type GapComponentType = (typeof GAP_COMPONENT_TYPES)[number];
export type ComponentType = (typeof COMPONENT_TYPES)[number];

// ============================================================================
// COMPONENT FIELDS (columns 6-9 of sequence lines)
// ============================================================================

/**
 * Orientation of a component relative to the object
 * Only `-` is reverse complemented; `?`, `0` and `na` are written forward
 */
export const ORIENTATIONS = ["+", "-", "?", "0", "na"] as const;

export type Orientation = (typeof ORIENTATIONS)[number];

// ============================================================================
// GAP FIELDS (columns 6-9 of gap lines)
// ============================================================================

export const GAP_TYPES = [
  "scaffold",
  "contig",
  "centromere",
  "short_arm",
  "heterochromatin",
  "telomere",
  "repeat",
  "contamination",
] as const;

export type GapType = (typeof GAP_TYPES)[number];

export const LINKAGE_VALUES = ["yes", "no"] as const;

export type Linkage = (typeof LINKAGE_VALUES)[number];

export const LINKAGE_EVIDENCE = [
  "na",
  "paired-ends",
  "align_genus",
  "align_xgenus",
  "align_trnscpt",
  "within_clone",
  "clone_contig",
  "map",
  "pcr",
  "proximity_ligation",
  "strobe",
  "unspecified",
] as const;

export type LinkageEvidence = (typeof LINKAGE_EVIDENCE)[number];

// ============================================================================
// LINE LAYOUT AND FIXED VALUES
// ============================================================================

/** Body lines have exactly this many tab-separated columns */
export const AGP_FIELD_COUNT = 9;

/** Lines starting with this marker are comments (header only) */
export const COMMENT_MARKER = "#";

/** Separator between linkage evidence tokens */
export const EVIDENCE_SEPARATOR = ";";

/** Type U gaps have a fixed placeholder length */
export const UNKNOWN_GAP_LENGTH = 100;

/** Character written for every base of a gap */
export const GAP_CHARACTER = "N";

/** Version this library validates against */
export const SUPPORTED_AGP_VERSION = "2.1";

/** Header directive naming the AGP version, e.g. `##agp-version 2.1` */
export const VERSION_DIRECTIVE = /^##agp-version\s+(\S+)/;

// ============================================================================
// LOOKUP
// ============================================================================

/**
 * Membership test that narrows a raw field to a table's union type
 */
export function isOneOf<T extends string>(table: readonly T[], value: string): value is T {
  return table.some((entry) => entry === value);
}

/**
 * Whether a component type describes a gap rather than sequence
 */
export function isGapComponentType(value: ComponentType): value is GapComponentType {
  return isOneOf(GAP_COMPONENT_TYPES, value);
}
