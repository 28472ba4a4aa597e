/**
 * Environment Configuration
 *
 * Centralized access to environment variables with type safety.
 */

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = parseInt(raw, 10);
  return isNaN(parsed) ? fallback : parsed;
}

/**
 * Defaults for the incremental feed parser.
 * Every value can be overridden per parse through FeedParserOptions.
 */
export const parserConfig = {
  /** Element name delimiting one record. Defaults to "item". */
  recordTag: process.env.FEEDPULL_RECORD_TAG || "item",

  /** Initial capacity of the byte window, in bytes. */
  initialBufferSize: intFromEnv("FEEDPULL_INITIAL_BUFFER_SIZE", 16 * 1024),

  /** Largest slice of buffered bytes handed to the tokenizer at once. */
  feedChunkSize: intFromEnv("FEEDPULL_FEED_CHUNK_SIZE", 16 * 1024),

  /** Consecutive zero-byte reads tolerated before input is treated as ended. */
  maxEmptyReads: intFromEnv("FEEDPULL_MAX_EMPTY_READS", 64),

  /** Bytes requested per read when the source is a file path. */
  fileChunkSize: intFromEnv("FEEDPULL_FILE_CHUNK_SIZE", 64 * 1024),
};

/**
 * Settings for fetching feeds over HTTP.
 */
export const fetcherConfig = {
  /** Contact email advertised in the User-Agent. Omitted when unset. */
  contactEmail: process.env.FEEDPULL_CONTACT_EMAIL,

  /** Project URL advertised in the User-Agent. */
  projectUrl: process.env.FEEDPULL_PROJECT_URL || "https://www.npmjs.com/package/feedpull",
};
