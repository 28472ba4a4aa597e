/**
 * Growable byte window between a ByteSource and the tokenizer.
 * Holds bytes that have been read but not yet consumed, reading more
 * only when asked for more than it holds.
 */

import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { toSourceError } from "./errors";
import type { ByteReadResult, ByteSource } from "./types";

/**
 * Outcome of ensure():
 * - "ready": the window holds at least the requested number of bytes
 * - "partial": input ended with fewer bytes than requested, but not none
 * - "eof": input ended and the window is empty
 */
export type EnsureStatus = "ready" | "partial" | "eof";

export class ByteBuffer {
  private bytes: Uint8Array;
  private start = 0;
  private end = 0;
  private inputEnded = false;
  private emptyReads = 0;
  private totalRead = 0;

  constructor(
    private readonly source: ByteSource,
    private readonly options: { initialSize: number; maxEmptyReads: number }
  ) {
    this.bytes = new Uint8Array(options.initialSize);
  }

  /**
   * Reads from the source until `minExtra` unconsumed bytes are available
   * or input ends. Source failures reject with a SourceError.
   */
  async ensure(minExtra: number): Promise<EnsureStatus> {
    while (this.remaining() < minExtra && !this.inputEnded) {
      let result: ByteReadResult;
      try {
        result = await this.source.read();
      } catch (error) {
        throw toSourceError(error, `Reading ${this.source.description} failed`);
      }

      switch (result.status) {
        case "data":
          this.emptyReads = 0;
          this.append(result.chunk);
          break;
        case "empty":
          this.emptyReads++;
          if (this.emptyReads > this.options.maxEmptyReads) {
            this.inputEnded = true;
          } else {
            await yieldToEventLoop();
          }
          break;
        case "end":
          this.inputEnded = true;
          break;
      }
    }

    if (this.remaining() >= minExtra) return "ready";
    return this.remaining() > 0 ? "partial" : "eof";
  }

  /** View of the unconsumed bytes, valid until the next append. */
  window(): Uint8Array {
    return this.bytes.subarray(this.start, this.end);
  }

  /** Drops the first `n` unconsumed bytes. */
  consume(n: number): void {
    if (n < 0 || n > this.remaining()) {
      throw new RangeError(`Cannot consume ${n} bytes; ${this.remaining()} available`);
    }
    this.start += n;
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
  }

  remaining(): number {
    return this.end - this.start;
  }

  capacity(): number {
    return this.bytes.byteLength;
  }

  ended(): boolean {
    return this.inputEnded;
  }

  bytesRead(): number {
    return this.totalRead;
  }

  private append(chunk: Uint8Array): void {
    this.totalRead += chunk.byteLength;

    if (this.end + chunk.byteLength > this.bytes.byteLength) {
      const needed = this.remaining() + chunk.byteLength;
      if (needed <= this.bytes.byteLength) {
        // Compact: move the unconsumed tail to the front
        this.bytes.copyWithin(0, this.start, this.end);
      } else {
        let size = this.bytes.byteLength;
        while (size < needed) size *= 2;
        const grown = new Uint8Array(size);
        grown.set(this.bytes.subarray(this.start, this.end));
        this.bytes = grown;
      }
      this.end -= this.start;
      this.start = 0;
    }

    this.bytes.set(chunk, this.end);
    this.end += chunk.byteLength;
  }
}
