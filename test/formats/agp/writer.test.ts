import { describe, expect, test } from "vitest";
import type { AgpComponentRecord, AgpGapRecord } from "../../../src/formats/agp/types";
import { validateAgpLine } from "../../../src/formats/agp/validation";
import { AgpWriter } from "../../../src/formats/agp/writer";

const component: AgpComponentRecord = {
  kind: "component",
  objectId: "chr1",
  objectBegin: 1,
  objectEnd: 500,
  partNumber: 1,
  lineNumber: 1,
  componentType: "W",
  componentId: "ctg7",
  componentBegin: 101,
  componentEnd: 600,
  orientation: "-",
};

const gap: AgpGapRecord = {
  kind: "gap",
  objectId: "chr1",
  objectBegin: 501,
  objectEnd: 600,
  partNumber: 2,
  lineNumber: 2,
  componentType: "U",
  gapLength: 100,
  gapType: "scaffold",
  linkage: "yes",
  linkageEvidence: ["paired-ends", "map"],
};

describe("AgpWriter", () => {
  test("formats a component record", () => {
    const writer = new AgpWriter();
    expect(writer.formatRecord(component)).toBe("chr1\t1\t500\t1\tW\tctg7\t101\t600\t-");
  });

  test("formats a gap record with joined evidence", () => {
    const writer = new AgpWriter();
    expect(writer.formatRecord(gap)).toBe("chr1\t501\t600\t2\tU\t100\tscaffold\tyes\tpaired-ends;map");
  });

  test("formats a file with a version directive", () => {
    const writer = new AgpWriter();
    expect(writer.formatRecords([component, gap])).toBe(
      "##agp-version\t2.1\n" +
        "chr1\t1\t500\t1\tW\tctg7\t101\t600\t-\n" +
        "chr1\t501\t600\t2\tU\t100\tscaffold\tyes\tpaired-ends;map\n"
    );
  });

  test("omits the version directive when asked", () => {
    const writer = new AgpWriter({ includeVersion: false });
    expect(writer.formatRecords([component])).toBe("chr1\t1\t500\t1\tW\tctg7\t101\t600\t-\n");
  });

  test("writes lines the validator reads back to the same record", () => {
    const writer = new AgpWriter();
    const { result } = validateAgpLine(writer.formatRecord(gap), 2);

    expect(result).toEqual({ success: true, value: { kind: "record", record: gap } });
  });
});
