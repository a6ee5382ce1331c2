import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CompressionError, ParseError, ValidationError } from "../../src/errors";
import { FaiBuilder, Faidx } from "../../src/operations/faidx";

const TEST_FASTA = `>chr1 First chromosome
ACGTACGTACGTACGTACGTACGTACGTACGT
ACGTACGTACGTACGTACGTACGTACGTACGT
>chr2 Second chromosome
TTTTTTTTTTTTTTTTTTTTTTTTTTTTTTTT
>chrM Mitochondrial genome
GGGGGGGGGGGGGGGG
`;

describe("FaiBuilder", () => {
  let tempDir: string;
  let testFastaPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "faidx-test-"));
    testFastaPath = join(tempDir, "test.fasta");
    writeFileSync(testFastaPath, TEST_FASTA);
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe("build()", () => {
    test("indexes every sequence in file order", async () => {
      const index = new FaiBuilder(testFastaPath);
      await index.build();

      expect(index.size()).toBe(3);
      expect(index.getSequenceIds()).toEqual(["chr1", "chr2", "chrM"]);
    });

    test("computes samtools-compatible records", async () => {
      const index = new FaiBuilder(testFastaPath);
      await index.build();

      expect(index.get("chr1")).toEqual({ name: "chr1", length: 64, offset: 23, linebases: 32, linewidth: 33 });
      expect(index.get("chr2")).toEqual({ name: "chr2", length: 32, offset: 113, linebases: 32, linewidth: 33 });
      expect(index.get("chrM")).toEqual({ name: "chrM", length: 16, offset: 173, linebases: 16, linewidth: 17 });
    });

    test("keys on the whole header in full header mode", async () => {
      const index = new FaiBuilder(testFastaPath);
      await index.build({ fullHeader: true });

      expect(index.has("chr1 First chromosome")).toBe(true);
      expect(index.has("chr1")).toBe(false);
    });

    test("counts two bytes for CRLF line endings", async () => {
      const path = join(tempDir, "crlf.fasta");
      writeFileSync(path, ">a\r\nACG\r\nTT\r\n");

      const index = new FaiBuilder(path);
      await index.build();

      expect(index.get("a")).toEqual({ name: "a", length: 5, offset: 4, linebases: 3, linewidth: 5 });
    });

    test("tolerates blank lines between records", async () => {
      const path = join(tempDir, "blank.fasta");
      writeFileSync(path, ">a\nACGT\n\n>b\nGG\n");

      const index = new FaiBuilder(path);
      await index.build();

      expect(index.get("b")).toEqual({ name: "b", length: 2, offset: 12, linebases: 2, linewidth: 3 });
    });

    test("starts the offset at the first sequence line after blank lines", async () => {
      const path = join(tempDir, "gap.fasta");
      writeFileSync(path, ">c\n\nACGT\n");

      const index = new FaiBuilder(path);
      await index.build();

      expect(index.get("c")).toEqual({ name: "c", length: 4, offset: 4, linebases: 4, linewidth: 5 });
    });

    test("indexes empty sequences", async () => {
      const path = join(tempDir, "empty.fasta");
      writeFileSync(path, ">e\n>f\nAC\n");

      const index = new FaiBuilder(path);
      await index.build();

      expect(index.get("e")).toEqual({ name: "e", length: 0, offset: 3, linebases: 0, linewidth: 0 });
      expect(index.get("f")?.length).toBe(2);
    });

    test("rejects a sequence line after a short one", async () => {
      const path = join(tempDir, "ragged.fasta");
      writeFileSync(path, ">a\nACG\nT\nACG\n");

      const index = new FaiBuilder(path);
      await expect(index.build()).rejects.toThrow(ParseError);
      await expect(index.build()).rejects.toThrow("Different line length in sequence 'a'");
    });

    test("rejects a line longer than the first", async () => {
      const path = join(tempDir, "long.fasta");
      writeFileSync(path, ">a\nAC\nACG\n");

      await expect(new FaiBuilder(path).build()).rejects.toThrow("Different line length in sequence 'a'");
    });

    test("rejects duplicate sequence names", async () => {
      const path = join(tempDir, "dup.fasta");
      writeFileSync(path, ">a\nAC\n>a desc\nGT\n");

      await expect(new FaiBuilder(path).build()).rejects.toThrow("Duplicate sequence name 'a'");
    });

    test("fails for a missing file", async () => {
      await expect(new FaiBuilder(join(tempDir, "missing.fasta")).build()).rejects.toThrow(
        "FASTA file not found"
      );
    });
  });

  describe("load()", () => {
    test("reads a .fai file", async () => {
      const faiPath = join(tempDir, "test.fasta.fai");
      writeFileSync(faiPath, "chr1\t64\t23\t32\t33\nchr2\t32\t113\t32\t33\n");

      const index = new FaiBuilder(testFastaPath);
      await index.load(faiPath);

      expect(index.getSequenceIds()).toEqual(["chr1", "chr2"]);
      expect(index.get("chr2")).toEqual({ name: "chr2", length: 32, offset: 113, linebases: 32, linewidth: 33 });
    });

    test("clears records from an earlier build", async () => {
      const index = new FaiBuilder(testFastaPath);
      await index.build();

      const faiPath = join(tempDir, "single.fai");
      writeFileSync(faiPath, "chr1\t64\t23\t32\t33\n");
      await index.load(faiPath);

      expect(index.size()).toBe(1);
      expect(index.has("chr2")).toBe(false);
    });

    test("accepts empty sequences", async () => {
      const faiPath = join(tempDir, "empty.fai");
      writeFileSync(faiPath, "e\t0\t3\t0\t0\n");

      const index = new FaiBuilder(testFastaPath);
      await index.load(faiPath);
      expect(index.get("e")?.length).toBe(0);
    });

    test("fails for a missing file", async () => {
      const index = new FaiBuilder(testFastaPath);
      await expect(index.load(join(tempDir, "missing.fai"))).rejects.toThrow("Index file not found");
    });

    test("rejects lines without five columns", async () => {
      const faiPath = join(tempDir, "short.fai");
      writeFileSync(faiPath, "chr1\t64\t6\n");

      const index = new FaiBuilder(testFastaPath);
      await expect(index.load(faiPath)).rejects.toThrow("Invalid .fai format: expected 5 columns, got 3");
    });

    test.each([
      ["an empty name", "\t64\t6\t32\t33\n"],
      ["a non-numeric length", "chr1\tabc\t6\t32\t33\n"],
      ["a negative offset", "chr1\t64\t-1\t32\t33\n"],
      ["zero bases per line", "chr1\t64\t6\t0\t33\n"],
      ["a line width below the bases per line", "chr1\t64\t6\t32\t30\n"],
    ])("rejects %s", async (_label, content) => {
      const faiPath = join(tempDir, "bad.fai");
      writeFileSync(faiPath, content);

      const index = new FaiBuilder(testFastaPath);
      await expect(index.load(faiPath)).rejects.toThrow(/^Invalid \.fai record/);
    });
  });
});

describe("Faidx", () => {
  let tempDir: string;
  let testFastaPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "faidx-test-"));
    testFastaPath = join(tempDir, "test.fasta");
    writeFileSync(testFastaPath, TEST_FASTA);
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test("extracts a whole sequence", async () => {
    const faidx = new Faidx(testFastaPath);
    await faidx.init();

    const chr1 = await faidx.extract("chr1");
    expect(chr1).toEqual({ format: "fasta", id: "chr1", sequence: "ACGT".repeat(16), length: 64 });
  });

  test("extracts a range across a line break", async () => {
    const faidx = new Faidx(testFastaPath);
    await faidx.init();

    const slice = await faidx.extract("chr1", { start: 30, end: 35 });
    expect(slice).toEqual({ format: "fasta", id: "chr1:30-35", sequence: "CGTACG", length: 6 });
  });

  test("extracts from CRLF files", async () => {
    const path = join(tempDir, "crlf.fasta");
    writeFileSync(path, ">a\r\nACG\r\nTT\r\n");

    const faidx = new Faidx(path);
    await faidx.init();

    expect((await faidx.extract("a")).sequence).toBe("ACGTT");
    expect((await faidx.extract("a", { start: 2, end: 5 })).sequence).toBe("CGTT");
  });

  test("extracts a sequence whose first line follows a blank line", async () => {
    const path = join(tempDir, "gap.fasta");
    writeFileSync(path, ">c\n\nACGT\n>d\nGG\n");

    const faidx = new Faidx(path);
    await faidx.init();

    expect((await faidx.extract("c")).sequence).toBe("ACGT");
    expect((await faidx.extract("c", { start: 2, end: 3 })).sequence).toBe("CG");
    expect((await faidx.extract("d")).sequence).toBe("GG");
  });

  test("extracts an empty sequence", async () => {
    const path = join(tempDir, "empty.fasta");
    writeFileSync(path, ">e\n>f\nAC\n");

    const faidx = new Faidx(path);
    await faidx.init();

    expect((await faidx.extract("e")).sequence).toBe("");
  });

  test("reports lengths and membership", async () => {
    const faidx = new Faidx(testFastaPath);
    await faidx.init();

    expect(faidx.has("chrM")).toBe(true);
    expect(faidx.has("chrX")).toBe(false);
    expect(faidx.getLength("chr2")).toBe(32);
    expect(faidx.getLength("chrX")).toBeUndefined();
    expect(faidx.getSequenceIds()).toEqual(["chr1", "chr2", "chrM"]);
  });

  test("rejects unknown sequences", async () => {
    const faidx = new Faidx(testFastaPath);
    await faidx.init();

    await expect(faidx.extract("chrX")).rejects.toThrow(ValidationError);
    await expect(faidx.extract("chrX")).rejects.toThrow('Sequence "chrX" not found in index');
  });

  test("rejects ranges outside the sequence", async () => {
    const faidx = new Faidx(testFastaPath);
    await faidx.init();

    await expect(faidx.extract("chrM", { start: 10, end: 17 })).rejects.toThrow(
      "End position 17 exceeds sequence length 16"
    );
    await expect(faidx.extract("chrM", { start: 0, end: 4 })).rejects.toThrow(
      "Start position 0 is less than 1"
    );
    await expect(faidx.extract("chrM", { start: 5, end: 4 })).rejects.toThrow(
      "Invalid range: start (5) > end (4)"
    );
  });

  test("uses an existing .fai file", async () => {
    writeFileSync(`${testFastaPath}.fai`, "renamed\t64\t23\t32\t33\n");

    const faidx = new Faidx(testFastaPath);
    await faidx.init();

    expect(faidx.getSequenceIds()).toEqual(["renamed"]);
    expect((await faidx.extract("renamed", { start: 1, end: 4 })).sequence).toBe("ACGT");
  });

  test("builds a full header index even when a .fai exists", async () => {
    writeFileSync(`${testFastaPath}.fai`, "renamed\t64\t23\t32\t33\n");

    const faidx = new Faidx(testFastaPath, { fullHeader: true });
    await faidx.init();

    expect(faidx.has("chrM Mitochondrial genome")).toBe(true);
    expect(faidx.has("renamed")).toBe(false);
  });

  test("refuses compressed FASTA files", async () => {
    const path = join(tempDir, "contigs.fasta");
    writeFileSync(path, new Uint8Array([0x1f, 0x8b, 0x08, 0x00, 0x00, 0x00]));

    const faidx = new Faidx(path);
    await expect(faidx.init()).rejects.toThrow(CompressionError);
  });

  test("reads a plain file despite a compressed extension", async () => {
    const path = join(tempDir, "contigs.fasta.gz");
    writeFileSync(path, ">a\nACGT\n");

    const faidx = new Faidx(path);
    await faidx.init();
    expect((await faidx.extract("a")).sequence).toBe("ACGT");
  });
});
