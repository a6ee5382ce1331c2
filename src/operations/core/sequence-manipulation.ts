/**
 * Core sequence manipulation operations
 *
 * Complement and reverse complement with IUPAC ambiguity code support.
 * Case is preserved; characters without a complement pass through.
 *
 * @module sequence-manipulation
 */

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * DNA complement mapping including IUPAC ambiguity codes
 */
const DNA_COMPLEMENT_MAP: Readonly<Record<string, string>> = {
  A: "T",
  T: "A",
  C: "G",
  G: "C",
  U: "A", // RNA
  R: "Y",
  Y: "R", // Purines <-> Pyrimidines
  S: "S",
  W: "W", // Self-complementary
  K: "M",
  M: "K", // Keto <-> Amino
  B: "V",
  V: "B", // Not A <-> Not T
  D: "H",
  H: "D", // Not C <-> Not G
  N: "N",
  "-": "-",
  ".": ".",
  "*": "*",
};

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Complement each base of a sequence
 *
 * @example
 * ```typescript
 * complement("ATCGn"); // "TAGCn"
 * ```
 */
export function complement(sequence: string): string {
  let result = "";

  for (const base of sequence) {
    const comp = DNA_COMPLEMENT_MAP[base.toUpperCase()];
    if (comp === undefined) {
      result += base;
    } else if (base !== base.toUpperCase()) {
      result += comp.toLowerCase();
    } else {
      result += comp;
    }
  }

  return result;
}

/**
 * Reverse a sequence
 *
 * @example
 * ```typescript
 * reverse("ATCG"); // "GCTA"
 * ```
 */
export function reverse(sequence: string): string {
  return sequence.split("").reverse().join("");
}

/**
 * Reverse complement of a sequence
 *
 * Applying it twice returns the original sequence unless it contains U,
 * which complements to A.
 *
 * @example
 * ```typescript
 * reverseComplement("ATCG"); // "CGAT"
 * reverseComplement("aacG"); // "Cgtt"
 * ```
 */
export function reverseComplement(sequence: string): string {
  return reverse(complement(sequence));
}
