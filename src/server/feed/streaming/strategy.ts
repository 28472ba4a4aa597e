import type { RawNode, RecordStrategy } from "./types";

/**
 * Builds a strategy from a pair of closures.
 *
 * @example
 * const titles = defineRecordStrategy(
 *   () => ({ title: "" }),
 *   (record, node) => {
 *     if (node.tag === "title") record.title = nodeValue(node) ?? "";
 *   }
 * );
 */
export function defineRecordStrategy<T>(
  init: () => T,
  populate: (record: T, node: RawNode) => void
): RecordStrategy<T> {
  return { init, populate };
}

/**
 * The usable value of a node: CDATA content when present, else its text.
 */
export function nodeValue(node: RawNode): string | undefined {
  return node.literal ?? node.text;
}
