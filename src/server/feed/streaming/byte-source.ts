/**
 * Byte source adapters.
 * Each one puts a byte-producing channel behind the ByteSource contract.
 */

import { open, type FileHandle } from "node:fs/promises";
import { Readable } from "node:stream";
import { SourceError, toSourceError } from "./errors";
import type { ByteReadResult, ByteSource } from "./types";
import { parserConfig } from "../../config/env";

/**
 * Anything the generic constructor accepts as input.
 */
export type ByteSourceInput = ByteSource | ReadableStream<Uint8Array> | Readable | Uint8Array | string;

const encoder = new TextEncoder();

/**
 * Wraps a WHATWG ReadableStream, such as a fetch response body.
 * An owned stream is cancelled on release; a borrowed one only has its lock released.
 */
export function fromWebStream(
  stream: ReadableStream<Uint8Array>,
  options: { owned?: boolean; description?: string } = {}
): ByteSource {
  const { owned = false, description = "stream" } = options;
  const reader = stream.getReader();
  let released = false;

  return {
    description,

    async read(): Promise<ByteReadResult> {
      // releaseLock() rejects a read that was still pending
      const next = await reader.read().catch((error: unknown) => {
        if (released) return null;
        throw error;
      });
      if (!next) return { status: "end" };
      const { done, value } = next;
      if (done) return { status: "end" };
      if (value.byteLength === 0) return { status: "empty" };
      return { status: "data", chunk: value };
    },

    async release(): Promise<void> {
      if (released) return;
      released = true;
      if (owned) {
        await reader.cancel();
      } else {
        reader.releaseLock();
      }
    },
  };
}

/**
 * Wraps a Node.js Readable (net.Socket, fs.ReadStream, process.stdin, ...).
 * Reads in paused mode; releasing detaches listeners and ends a pending read
 * but leaves the stream open, since its owner is responsible for closing it.
 */
export class NodeReadableSource implements ByteSource {
  readonly description: string;
  private failure: Error | null = null;
  private released = false;
  private wake: (() => void) | null = null;
  private readonly onError = (error: Error) => {
    this.failure = error;
  };

  constructor(
    private readonly stream: Readable,
    description = "readable"
  ) {
    this.description = description;
    this.stream.on("error", this.onError);
  }

  async read(): Promise<ByteReadResult> {
    while (true) {
      if (this.released) return { status: "end" };

      const failure = this.failure ?? this.stream.errored;
      if (failure) {
        throw toSourceError(failure, `Reading ${this.description} failed`);
      }

      const chunk: unknown = this.stream.read();
      if (chunk !== null) {
        return { status: "data", chunk: toBytes(chunk) };
      }
      if (this.stream.readableEnded || this.stream.destroyed) {
        return { status: "end" };
      }

      await this.waitForActivity();
    }
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    this.wake?.();
    // destroy() emits its error on a later tick; an errored stream keeps the listener
    if (!this.stream.errored) this.stream.off("error", this.onError);
  }

  private waitForActivity(): Promise<void> {
    return new Promise((resolve) => {
      const events = ["readable", "end", "close", "error"] as const;
      const done = () => {
        for (const event of events) this.stream.off(event, done);
        this.wake = null;
        resolve();
      };
      this.wake = done;
      for (const event of events) this.stream.on(event, done);
    });
  }
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === "string") return encoder.encode(chunk);
  throw new SourceError("Readable produced a non-byte chunk (object mode is not supported)");
}

export function fromNodeReadable(stream: Readable, description?: string): ByteSource {
  return new NodeReadableSource(stream, description);
}

/**
 * Reads a file through a FileHandle, reusing one scratch buffer.
 */
class FileSource implements ByteSource {
  private readonly scratch: Uint8Array;
  private handle: FileHandle | null;

  constructor(
    handle: FileHandle,
    readonly description: string,
    chunkSize: number
  ) {
    this.handle = handle;
    this.scratch = new Uint8Array(chunkSize);
  }

  async read(): Promise<ByteReadResult> {
    if (!this.handle) return { status: "end" };
    const { bytesRead } = await this.handle.read(this.scratch, 0, this.scratch.byteLength, null);
    if (bytesRead === 0) return { status: "end" };
    return { status: "data", chunk: this.scratch.subarray(0, bytesRead) };
  }

  async release(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }
}

/**
 * Opens a file for reading. Open failures (ENOENT, EACCES, EISDIR...)
 * reject with a SourceError carrying the OS error code.
 */
export async function openFileSource(
  path: string,
  options: { chunkSize?: number } = {}
): Promise<ByteSource> {
  const { chunkSize = parserConfig.fileChunkSize } = options;
  let handle: FileHandle;
  try {
    handle = await open(path, "r");
  } catch (error) {
    throw toSourceError(error, `Cannot open feed file ${path}`);
  }
  return new FileSource(handle, path, chunkSize);
}

/**
 * In-memory source handing out the bytes in fixed-size chunks.
 */
export function fromBytes(
  input: Uint8Array | string,
  options: { chunkSize?: number; description?: string } = {}
): ByteSource {
  const bytes = typeof input === "string" ? encoder.encode(input) : input;
  const { chunkSize = Math.max(bytes.byteLength, 1), description = "memory" } = options;
  let offset = 0;

  return {
    description,
    async read(): Promise<ByteReadResult> {
      if (offset >= bytes.byteLength) return { status: "end" };
      const chunk = bytes.subarray(offset, offset + chunkSize);
      offset += chunk.byteLength;
      return { status: "data", chunk };
    },
  };
}

function isByteSource(input: ByteSourceInput): input is ByteSource {
  return typeof input === "object" && "read" in input && "description" in input;
}

/**
 * Picks the adapter matching a generic byte-readable handle.
 */
export function toByteSource(input: ByteSourceInput): ByteSource {
  if (typeof input === "string" || input instanceof Uint8Array) {
    return fromBytes(input);
  }
  if (input instanceof Readable) {
    return fromNodeReadable(input);
  }
  if (input instanceof ReadableStream) {
    return fromWebStream(input);
  }
  if (isByteSource(input)) {
    return input;
  }
  throw new SourceError("Unsupported byte source input");
}
