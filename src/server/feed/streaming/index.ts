/**
 * Incremental record parser.
 * Pulls bytes from a source and yields one record per record element,
 * without holding the whole document in memory.
 */

// Types
export type {
  RawNode,
  RecordStrategy,
  ParseState,
  ParseStats,
  ByteSource,
  ByteReadResult,
  MarkupEvent,
  TokenizerResult,
} from "./types";
export type { FeedParserOptions, ResolvedFeedParserOptions } from "./options";
export type { ByteSourceInput } from "./byte-source";
export type { EnsureStatus } from "./buffer";
export type { FetchFeedRecordsOptions } from "./sources";

// Engine and its components
export { FeedRecordParser } from "./engine";
export { ByteBuffer } from "./buffer";
export { MarkupTokenizer } from "./tokenizer";
export { RecordAccumulator } from "./record-accumulator";
export { feedParserOptionsSchema, resolveParserOptions } from "./options";
export { defineRecordStrategy, nodeValue } from "./strategy";
export { SourceError, ConcurrentPullError } from "./errors";

// Byte sources
export {
  fromWebStream,
  fromNodeReadable,
  openFileSource,
  fromBytes,
  toByteSource,
} from "./byte-source";

// Constructors
export {
  parseRecords,
  openFeedFile,
  fromSocket,
  connectFeedSocket,
  fetchFeedRecords,
} from "./sources";
