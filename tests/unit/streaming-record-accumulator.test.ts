/**
 * Unit tests for the record accumulator state machine.
 */

import { describe, it, expect } from "vitest";
import { createLogger } from "../../src/lib/logger";
import { RecordAccumulator, type MarkupEvent, type RawNode } from "../../src/server/feed/streaming";
import { nodeListStrategy } from "../utils/feed";

const quietLogger = createLogger({ minLevel: "error" });

const start = (name: string, attributes: Record<string, string> = {}): MarkupEvent => ({
  kind: "start",
  name,
  attributes,
});
const end = (name: string): MarkupEvent => ({ kind: "end", name });
const text = (value: string): MarkupEvent => ({ kind: "text", text: value });
const literal = (value: string): MarkupEvent => ({ kind: "literal", text: value });
const malformed = (name: string): MarkupEvent => ({ kind: "malformed", name });

function createAccumulator() {
  return new RecordAccumulator("item", nodeListStrategy, quietLogger);
}

/** Applies events in order and returns every completed record. */
function run(accumulator: RecordAccumulator<RawNode[]>, events: MarkupEvent[]): RawNode[][] {
  const completed: RawNode[][] = [];
  for (const event of events) {
    const result = accumulator.accept(event);
    if (result) completed.push(result.record);
  }
  return completed;
}

describe("RecordAccumulator", () => {
  it("ignores everything outside a record", () => {
    const accumulator = createAccumulator();

    const records = run(accumulator, [start("channel"), start("title"), text("Feed"), end("title")]);

    expect(records).toEqual([]);
    expect(accumulator.state).toBe("seeking");
  });

  it("collects field nodes until the record closes", () => {
    const accumulator = createAccumulator();

    const records = run(accumulator, [
      start("item"),
      text("\n  "),
      start("title"),
      text("  Hello "),
      text("world  "),
      end("title"),
      start("guid", { ispermalink: "false" }),
      text("id-1"),
      end("guid"),
    ]);

    expect(records).toEqual([]);
    expect(accumulator.state).toBe("in_record");

    const [record] = run(accumulator, [end("item")]);

    expect(record).toEqual([
      { tag: "title", text: "Hello world", attributes: {} },
      { tag: "guid", text: "id-1", attributes: { ispermalink: "false" } },
    ]);
    expect(accumulator.state).toBe("seeking");
    expect(accumulator.recordsCompleted).toBe(1);
  });

  it("leaves text and literal absent when a field has neither", () => {
    const [record] = run(createAccumulator(), [
      start("item"),
      start("comments"),
      text("   "),
      end("comments"),
      end("item"),
    ]);

    expect(record).toEqual([{ tag: "comments", attributes: {} }]);
  });

  it("joins several CDATA sections of one field", () => {
    const [record] = run(createAccumulator(), [
      start("item"),
      start("description"),
      literal("one "),
      literal(""),
      literal("two"),
      end("description"),
      end("item"),
    ]);

    expect(record).toEqual([{ tag: "description", literal: "one two", attributes: {} }]);
  });

  it("delivers nested fields inner first", () => {
    const [record] = run(createAccumulator(), [
      start("item"),
      start("media:group"),
      start("media:title"),
      text("Clip"),
      end("media:title"),
      end("media:group"),
      end("item"),
    ]);

    expect(record.map((node) => node.tag)).toEqual(["media:title", "media:group"]);
  });

  it("drops a field flagged as malformed", () => {
    const accumulator = createAccumulator();

    const [record] = run(accumulator, [
      start("item"),
      start("title"),
      text("ok"),
      end("title"),
      start("description"),
      text("cut"),
      malformed("description"),
      end("description"),
      end("item"),
    ]);

    expect(record.map((node) => node.tag)).toEqual(["title"]);
    expect(accumulator.nodesSkipped).toBe(1);
  });

  it("discards a record whose boundary was closed implicitly", () => {
    const accumulator = createAccumulator();

    const records = run(accumulator, [
      start("item"),
      start("title"),
      text("lost"),
      end("title"),
      malformed("item"),
      end("item"),
    ]);

    expect(records).toEqual([]);
    expect(accumulator.state).toBe("seeking");
    expect(accumulator.recordsDiscarded).toBe(1);
  });

  it("discards a partial record on request", () => {
    const accumulator = createAccumulator();
    run(accumulator, [start("item"), start("title"), text("partial")]);

    expect(accumulator.discard("input ended")).toBe(true);
    expect(accumulator.discard("input ended")).toBe(false);
    expect(accumulator.state).toBe("seeking");
    expect(accumulator.recordsDiscarded).toBe(1);
  });

  it("starts a fresh record for each record element", () => {
    const records = run(createAccumulator(), [
      start("item"),
      start("title"),
      text("A"),
      end("title"),
      end("item"),
      start("item"),
      end("item"),
    ]);

    expect(records).toEqual([[{ tag: "title", text: "A", attributes: {} }], []]);
  });
});
