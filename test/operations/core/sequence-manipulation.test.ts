import { describe, expect, test } from "vitest";
import {
  complement,
  reverse,
  reverseComplement,
} from "../../../src/operations/core/sequence-manipulation";

describe("complement", () => {
  test("complements DNA bases", () => {
    expect(complement("ATCG")).toBe("TAGC");
  });

  test("preserves case", () => {
    expect(complement("AtcG")).toBe("TagC");
  });

  test("complements IUPAC ambiguity codes", () => {
    expect(complement("RYKMBVDHSWN")).toBe("YRMKVBHDSWN");
  });

  test("passes unknown characters through", () => {
    expect(complement("AXZ")).toBe("TXZ");
  });

  test("maps RNA uracil to adenine", () => {
    expect(complement("U")).toBe("A");
  });
});

describe("reverse", () => {
  test("reverses a sequence", () => {
    expect(reverse("ATCG")).toBe("GCTA");
  });
});

describe("reverseComplement", () => {
  test("reverse complements a sequence", () => {
    expect(reverseComplement("ACGTAC")).toBe("GTACGT");
    expect(reverseComplement("aacG")).toBe("Cgtt");
  });

  test("returns the original DNA when applied twice", () => {
    const sequence = "ACGTNacgtnRYKM";
    expect(reverseComplement(reverseComplement(sequence))).toBe(sequence);
  });

  test("handles the empty sequence", () => {
    expect(reverseComplement("")).toBe("");
  });
});
