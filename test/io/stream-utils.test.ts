/**
 * Tests for line splitting over byte streams
 */

import { describe, expect, test } from "vitest";
import { StreamError } from "../../src/errors";
import { readByteLines, readLines } from "../../src/io/stream-utils";
import { collect } from "../utils/collect";

function streamOf(...chunks: Array<string | number[]>): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(typeof chunk === "string" ? encoder.encode(chunk) : new Uint8Array(chunk));
      }
      controller.close();
    },
  });
}

function failingStream(message: string): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(new Error(message));
    },
  });
}

describe("readLines", () => {
  test("joins lines across chunks and keeps blank lines", async () => {
    expect(await collect(readLines(streamOf("a\r\nb", "\n\nc")))).toEqual(["a", "b", "", "c"]);
  });

  test("does not yield an empty line after the final newline", async () => {
    expect(await collect(readLines(streamOf("x\n")))).toEqual(["x"]);
  });

  test("decodes multi-byte characters split between chunks", async () => {
    expect(await collect(readLines(streamOf([0x63, 0xc3], [0xa9, 0x0a])))).toEqual(["cé"]);
  });

  test("yields nothing for an empty stream", async () => {
    expect(await collect(readLines(streamOf()))).toEqual([]);
  });

  test("wraps stream failures", async () => {
    const failure = collect(readLines(failingStream("disk gone")));

    await expect(failure).rejects.toThrow(StreamError);
    await expect(collect(readLines(failingStream("disk gone")))).rejects.toThrow(
      "Line reading failed: disk gone"
    );
  });
});

describe("readByteLines", () => {
  test("reports the terminator length of every line", async () => {
    const lines = await collect(readByteLines(streamOf("AC\r\nG", "T\n\nT")));
    const decoder = new TextDecoder();

    expect(lines.map((line) => [decoder.decode(line.bytes), line.terminatorLength])).toEqual([
      ["AC", 2],
      ["GT", 1],
      ["", 1],
      ["T", 0],
    ]);
  });

  test("wraps stream failures", async () => {
    await expect(collect(readByteLines(failingStream("short read")))).rejects.toThrow(
      "Byte line reading failed: short read"
    );
  });
});
