/**
 * Tests for incremental FASTA writing
 */

import { WritableStream } from "node:stream/web";
import { describe, expect, test } from "vitest";
import { ValidationError } from "../../src/errors";
import { FastaStreamWriter, writeToStream } from "../../src/formats/fasta";

describe("FastaStreamWriter", () => {
  test("writes each record on one line by default", () => {
    const writer = new FastaStreamWriter();
    const out = [
      writer.beginRecord("scaf1"),
      writer.appendSequence("ACGT"),
      writer.appendSequence("NN"),
      writer.beginRecord("scaf2"),
      writer.appendSequence("TTTT"),
      writer.finish(),
    ];

    expect(out).toEqual([">scaf1\n", "ACGT", "NN", "\n>scaf2\n", "TTTT", "\n"]);
    expect(out.join("")).toBe(">scaf1\nACGTNN\n>scaf2\nTTTT\n");
    expect(writer.records).toBe(2);
  });

  test("wraps across appended pieces", () => {
    const writer = new FastaStreamWriter({ lineWidth: 4 });
    const out =
      writer.beginRecord("s") +
      writer.appendSequence("ACGTAC") +
      writer.appendSequence("GT") +
      writer.appendSequence("A") +
      writer.finish();

    expect(out).toBe(">s\nACGT\nACGT\nA\n");
  });

  test("never writes an empty line when the sequence fills the last line", () => {
    const writer = new FastaStreamWriter({ lineWidth: 4 });
    const out =
      writer.beginRecord("a") +
      writer.appendSequence("ACGTACGT") +
      writer.beginRecord("b") +
      writer.appendSequence("GGGG") +
      writer.finish();

    expect(out).toBe(">a\nACGT\nACGT\n>b\nGGGG\n");
  });

  test("appending nothing writes nothing", () => {
    const writer = new FastaStreamWriter({ lineWidth: 3 });
    writer.beginRecord("a");
    expect(writer.appendSequence("")).toBe("");
  });

  test("finish alone writes a single newline", () => {
    expect(new FastaStreamWriter().finish()).toBe("\n");
  });

  test("rejects a negative line width", () => {
    expect(() => new FastaStreamWriter({ lineWidth: -1 })).toThrow(ValidationError);
  });
});

describe("writeToStream", () => {
  test("encodes chunks in order", async () => {
    const received: Uint8Array[] = [];
    const sink = new WritableStream<Uint8Array>({
      write(chunk) {
        received.push(chunk);
      },
    });

    async function* chunks(): AsyncIterable<string> {
      yield ">a\n";
      yield "ACGT";
      yield "\n";
    }

    await writeToStream(chunks(), sink);

    const decoder = new TextDecoder();
    expect(received.map((chunk) => decoder.decode(chunk))).toEqual([">a\n", "ACGT", "\n"]);
  });
});
