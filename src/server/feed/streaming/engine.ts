/**
 * Incremental record parser.
 *
 * Drives ByteSource -> ByteBuffer -> MarkupTokenizer -> RecordAccumulator,
 * one record per pull. The only suspension points are byte reads; all state
 * needed to resume lives on the instance, so a pull picks up exactly where the
 * previous one stopped.
 */

import { createParseLogger, type Logger } from "@/lib/logger";
import { ByteBuffer } from "./buffer";
import { ConcurrentPullError, SourceError } from "./errors";
import {
  resolveParserOptions,
  type FeedParserOptions,
  type ResolvedFeedParserOptions,
} from "./options";
import { RecordAccumulator, type CompletedRecord } from "./record-accumulator";
import { MarkupTokenizer } from "./tokenizer";
import type { ByteSource, ParseState, ParseStats, RecordStrategy } from "./types";

export class FeedRecordParser<T> implements AsyncIterable<T> {
  readonly options: ResolvedFeedParserOptions;

  private readonly buffer: ByteBuffer;
  private readonly tokenizer = new MarkupTokenizer();
  private readonly accumulator: RecordAccumulator<T>;
  private readonly log: Logger;

  private terminal: "exhausted" | "failed" | null = null;
  private pulling = false;
  private sourceError: SourceError | undefined;

  /**
   * @param source - Where bytes come from; released when the parse ends or is closed
   * @param strategy - Builds and populates one record per record element
   * @throws ZodError when options are invalid
   */
  constructor(
    private readonly source: ByteSource,
    strategy: RecordStrategy<T>,
    options?: FeedParserOptions
  ) {
    this.options = resolveParserOptions(options);
    this.log = createParseLogger({
      source: source.description,
      recordTag: this.options.recordTag,
    });
    this.buffer = new ByteBuffer(source, {
      initialSize: this.options.initialBufferSize,
      maxEmptyReads: this.options.maxEmptyReads,
    });
    this.accumulator = new RecordAccumulator(this.options.recordTag, strategy, this.log);
  }

  get state(): ParseState {
    return this.terminal ?? this.accumulator.state;
  }

  /** The source failure that ended the parse, if it ended that way. */
  get failure(): SourceError | undefined {
    return this.sourceError;
  }

  get stats(): ParseStats {
    return {
      recordsEmitted: this.accumulator.recordsCompleted,
      recordsDiscarded: this.accumulator.recordsDiscarded,
      nodesSkipped: this.accumulator.nodesSkipped,
      bytesRead: this.buffer.bytesRead(),
    };
  }

  /**
   * Pulls the next completed record.
   * Resolves to undefined once no more records will be produced.
   */
  async nextRecord(): Promise<T | undefined> {
    const completed = await this.nextCompleted();
    return completed?.record;
  }

  /**
   * Async generator over the remaining records. Not restartable: records
   * already pulled are not produced again. Leaving the loop early closes
   * the parser.
   */
  async *records(): AsyncGenerator<T, void, undefined> {
    try {
      while (true) {
        const completed = await this.nextCompleted();
        if (!completed) return;
        yield completed.record;
      }
    } finally {
      await this.close();
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    return this.records();
  }

  /**
   * Abandons the parse: drops the record in progress and releases the source.
   */
  async close(): Promise<void> {
    this.accumulator.discard("parser closed");
    await this.shutdown("exhausted");
  }

  private async nextCompleted(): Promise<CompletedRecord<T> | undefined> {
    if (this.pulling) {
      throw new ConcurrentPullError();
    }
    if (this.terminal) return undefined;

    this.pulling = true;
    try {
      return await this.pull();
    } finally {
      this.pulling = false;
    }
  }

  private async pull(): Promise<CompletedRecord<T> | undefined> {
    try {
      while (!this.terminal) {
        const result = this.tokenizer.next();

        if (result.kind === "need-more") {
          await this.fill();
          continue;
        }

        if (result.kind === "end-of-input") {
          this.accumulator.discard("input ended inside a record");
          await this.shutdown("exhausted");
          return undefined;
        }

        const completed = this.accumulator.accept(result);
        if (completed) return completed;
      }
      return undefined;
    } catch (error) {
      if (error instanceof SourceError) {
        // close() released the source under a pending read
        if (this.terminal) return undefined;

        this.sourceError = error;
        this.log.warn("Byte source failed, ending record sequence", {
          error: error.message,
          code: error.code,
        });
        this.accumulator.discard("byte source failed");
        await this.shutdown("failed");
        return undefined;
      }

      await this.shutdown("failed");
      throw error;
    }
  }

  /**
   * Moves the next slice of buffered bytes into the tokenizer,
   * reading from the source first when the buffer is empty.
   */
  private async fill(): Promise<void> {
    const status = await this.buffer.ensure(1);
    if (status === "eof") {
      this.tokenizer.finish();
      return;
    }

    const window = this.buffer.window();
    const size = Math.min(window.byteLength, this.options.feedChunkSize);
    this.tokenizer.feed(window.subarray(0, size));
    this.buffer.consume(size);
  }

  private async shutdown(state: "exhausted" | "failed"): Promise<void> {
    if (this.terminal) return;
    this.terminal = state;
    this.log.debug("Record sequence ended", { state, ...this.stats });

    try {
      await this.source.release?.();
    } catch (error) {
      this.log.warn("Releasing byte source failed", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
