/**
 * Per-parse options, validated with zod.
 * Defaults come from the environment configuration.
 */

import { z } from "zod";
import { parserConfig } from "../../config/env";

export const feedParserOptionsSchema = z.object({
  /** Element name delimiting one record; matched case-insensitively */
  recordTag: z
    .string()
    .trim()
    .min(1)
    .transform((tag) => tag.toLowerCase())
    .default(parserConfig.recordTag),
  initialBufferSize: z.number().int().positive().default(parserConfig.initialBufferSize),
  feedChunkSize: z.number().int().positive().default(parserConfig.feedChunkSize),
  maxEmptyReads: z.number().int().nonnegative().default(parserConfig.maxEmptyReads),
});

export type FeedParserOptions = z.input<typeof feedParserOptionsSchema>;
export type ResolvedFeedParserOptions = z.output<typeof feedParserOptionsSchema>;

/**
 * Applies defaults and validates options. Throws a ZodError when invalid.
 */
export function resolveParserOptions(options: FeedParserOptions = {}): ResolvedFeedParserOptions {
  return feedParserOptionsSchema.parse(options);
}
