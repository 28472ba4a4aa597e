/**
 * Types shared by the incremental record parser.
 */

/**
 * One fully parsed element inside a record.
 * Text and literal content are independently optional.
 */
export interface RawNode {
  /** Lower-cased element name, prefix included (e.g. "content:encoded") */
  readonly tag: string;
  /** Entity-decoded, trimmed text of the element; absent when empty */
  readonly text?: string;
  /** Verbatim CDATA content of the element; absent when it has none */
  readonly literal?: string;
  /** Attributes with lower-cased names and decoded values */
  readonly attributes: Readonly<Record<string, string>>;
}

/**
 * Integrator-supplied field dispatch for one record type.
 * Unrecognized tags are ignored by convention.
 */
export interface RecordStrategy<T> {
  /** Creates the zero-valued record when a record element opens. */
  init(): T;
  /** Applies one completed field element to the record. */
  populate(record: T, node: RawNode): void;
}

/**
 * Where a parse stands.
 */
export type ParseState = "seeking" | "in_record" | "exhausted" | "failed";

/**
 * Outcome of one read from a byte source.
 * A data chunk is only valid until the next read.
 */
export type ByteReadResult =
  | { status: "data"; chunk: Uint8Array }
  | { status: "empty" }
  | { status: "end" };

/**
 * Uniform contract over any byte-producing channel.
 * At most one read is outstanding at a time.
 */
export interface ByteSource {
  /** Short description used in log context, e.g. a path or URL */
  readonly description: string;
  read(): Promise<ByteReadResult>;
  /** Lets go of the underlying channel. Safe to call more than once. */
  release?(): Promise<void>;
}

/**
 * Lexical events produced by the tokenizer.
 */
export type MarkupEvent =
  | { kind: "start"; name: string; attributes: Record<string, string> }
  | { kind: "end"; name: string }
  | { kind: "text"; text: string }
  | { kind: "literal"; text: string }
  | { kind: "malformed"; name: string };

/**
 * Result of pulling from the tokenizer: an event, or a control signal.
 */
export type TokenizerResult = MarkupEvent | { kind: "need-more" } | { kind: "end-of-input" };

/**
 * Counters describing one parse.
 */
export interface ParseStats {
  /** Records handed to the caller */
  recordsEmitted: number;
  /** Partial records dropped (malformed boundary or truncated input) */
  recordsDiscarded: number;
  /** Field nodes dropped because their element was never closed */
  nodesSkipped: number;
  /** Bytes read from the source */
  bytesRead: number;
}
