/**
 * Shared helpers for record parser tests.
 */

import type { ByteReadResult, ByteSource, RawNode, RecordStrategy } from "../../src/server/feed/streaming";

/**
 * Minimal record used across tests. Text wins over CDATA, as a plain
 * integrator strategy would do it.
 */
export interface TestItem {
  title?: string;
  description?: string;
  link?: string;
  pubDate?: string;
}

export const testItemStrategy: RecordStrategy<TestItem> = {
  init: () => ({}),
  populate(item, node) {
    const value = node.text ?? node.literal;
    switch (node.tag) {
      case "title":
        item.title = value;
        break;
      case "description":
        item.description = value;
        break;
      case "link":
        item.link = value;
        break;
      case "pubdate":
        item.pubDate = value;
        break;
    }
  },
};

/**
 * Strategy whose records are the list of nodes delivered to them.
 */
export const nodeListStrategy: RecordStrategy<RawNode[]> = {
  init: () => [],
  populate(nodes, node) {
    nodes.push(node);
  },
};

/**
 * Source replaying a fixed script of read results, then "end".
 * A string entry is a data chunk; an Error entry makes that read reject.
 */
export function scriptedSource(
  script: Array<ByteReadResult | string | Error>,
  description = "scripted"
): ByteSource & { reads: number } {
  const encoder = new TextEncoder();
  const source = {
    description,
    reads: 0,
    async read(): Promise<ByteReadResult> {
      const step = script[source.reads++];
      if (step === undefined) return { status: "end" };
      if (step instanceof Error) throw step;
      if (typeof step === "string") return { status: "data", chunk: encoder.encode(step) };
      return step;
    },
  };
  return source;
}

export async function collect<T>(records: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of records) {
    items.push(item);
  }
  return items;
}

export function stringToChunkedStream(str: string, chunkSize: number): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  const bytes = encoder.encode(str);
  return new ReadableStream({
    start(controller) {
      for (let i = 0; i < bytes.length; i += chunkSize) {
        controller.enqueue(bytes.slice(i, i + chunkSize));
      }
      controller.close();
    },
  });
}

export const SAMPLE_RSS = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
    <channel>
        <title>Test RSS Feed</title>
        <description>A test RSS feed</description>
        <item>
            <title>First Item</title>
            <description>Description of first item</description>
            <link>https://example.com/1</link>
            <pubDate>Mon, 01 Jan 2024 00:00:00 GMT</pubDate>
        </item>
        <item>
            <title>Second Item</title>
            <description><![CDATA[Description with <b>HTML</b> content]]></description>
            <link>https://example.com/2</link>
            <pubDate>Tue, 02 Jan 2024 00:00:00 GMT</pubDate>
        </item>
    </channel>
</rss>`;
