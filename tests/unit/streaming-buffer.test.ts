/**
 * Unit tests for the byte window between source and tokenizer.
 */

import { describe, it, expect } from "vitest";
import { ByteBuffer, SourceError } from "../../src/server/feed/streaming";
import { scriptedSource } from "../utils/feed";

const decoder = new TextDecoder();

describe("ByteBuffer", () => {
  it("reads only until the requested bytes are available", async () => {
    const source = scriptedSource(["abc", "def"]);
    const buffer = new ByteBuffer(source, { initialSize: 16, maxEmptyReads: 0 });

    expect(await buffer.ensure(2)).toBe("ready");
    expect(source.reads).toBe(1);
    expect(decoder.decode(buffer.window())).toBe("abc");

    expect(await buffer.ensure(3)).toBe("ready");
    expect(source.reads).toBe(1);
  });

  it("compacts before growing and grows by doubling", async () => {
    const source = scriptedSource(["abc", "def", "ghijklmn"]);
    const buffer = new ByteBuffer(source, { initialSize: 4, maxEmptyReads: 0 });

    expect(await buffer.ensure(3)).toBe("ready");
    buffer.consume(2);
    expect(buffer.remaining()).toBe(1);

    expect(await buffer.ensure(4)).toBe("ready");
    expect(decoder.decode(buffer.window())).toBe("cdef");
    expect(buffer.capacity()).toBe(4);

    expect(await buffer.ensure(12)).toBe("ready");
    expect(decoder.decode(buffer.window())).toBe("cdefghijklmn");
    expect(buffer.capacity()).toBe(16);

    buffer.consume(12);
    expect(buffer.remaining()).toBe(0);
    expect(await buffer.ensure(1)).toBe("eof");
    expect(buffer.ended()).toBe(true);
    expect(buffer.bytesRead()).toBe(14);
  });

  it("reports partial data when input ends short of the request", async () => {
    const buffer = new ByteBuffer(scriptedSource(["ab"]), { initialSize: 8, maxEmptyReads: 0 });

    expect(await buffer.ensure(5)).toBe("partial");
    expect(decoder.decode(buffer.window())).toBe("ab");
  });

  it("gives up after the empty-read budget", async () => {
    const empty = { status: "empty" } as const;
    const source = scriptedSource([empty, empty, empty, empty, "late"]);
    const buffer = new ByteBuffer(source, { initialSize: 8, maxEmptyReads: 3 });

    expect(await buffer.ensure(1)).toBe("eof");
    expect(source.reads).toBe(4);
  });

  it("resets the empty-read budget after data arrives", async () => {
    const empty = { status: "empty" } as const;
    const source = scriptedSource([empty, empty, "a", empty, empty, "b"]);
    const buffer = new ByteBuffer(source, { initialSize: 8, maxEmptyReads: 2 });

    expect(await buffer.ensure(2)).toBe("ready");
    expect(decoder.decode(buffer.window())).toBe("ab");
  });

  it("wraps read failures in a SourceError", async () => {
    const cause = new Error("socket hang up");
    const buffer = new ByteBuffer(scriptedSource([cause]), { initialSize: 8, maxEmptyReads: 0 });

    const error = await buffer.ensure(1).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceError);
    if (!(error instanceof SourceError)) return;
    expect(error.message).toBe("Reading scripted failed: socket hang up");
    expect(error.cause).toBe(cause);
  });

  it("refuses to consume more than it holds", async () => {
    const buffer = new ByteBuffer(scriptedSource(["abc"]), { initialSize: 8, maxEmptyReads: 0 });
    await buffer.ensure(1);

    expect(() => buffer.consume(4)).toThrow(RangeError);
  });
});
