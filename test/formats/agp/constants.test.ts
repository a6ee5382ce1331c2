import { describe, expect, test } from "vitest";
import {
  COMPONENT_TYPES,
  GAP_TYPES,
  isGapComponentType,
  isOneOf,
  LINKAGE_EVIDENCE,
  ORIENTATIONS,
  VERSION_DIRECTIVE,
} from "../../../src/formats/agp/constants";

describe("AGP vocabularies", () => {
  test("have the AGP v2.1 sizes", () => {
    expect(COMPONENT_TYPES).toHaveLength(9);
    expect(ORIENTATIONS).toHaveLength(5);
    expect(GAP_TYPES).toHaveLength(8);
    expect(LINKAGE_EVIDENCE).toHaveLength(12);
  });

  test("isOneOf matches exact values only", () => {
    expect(isOneOf(ORIENTATIONS, "na")).toBe(true);
    expect(isOneOf(ORIENTATIONS, "NA")).toBe(false);
    expect(isOneOf(GAP_TYPES, "scaffold ")).toBe(false);
  });

  test("N and U are the gap component types", () => {
    expect(COMPONENT_TYPES.filter(isGapComponentType)).toEqual(["N", "U"]);
  });

  test("version directive needs two leading hashes", () => {
    expect(VERSION_DIRECTIVE.test("##agp-version\t2.1")).toBe(true);
    expect(VERSION_DIRECTIVE.test("#agp-version 2.1")).toBe(false);
  });
});
