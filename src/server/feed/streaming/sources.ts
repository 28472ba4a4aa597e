/**
 * Constructors binding a FeedRecordParser to a concrete input.
 * Setup failures (missing file, refused connection, HTTP error status)
 * reject here, before any record is pulled.
 */

import { connect, type Socket } from "node:net";
import { logger } from "@/lib/logger";
import { buildUserAgent } from "../../http/user-agent";
import {
  fromNodeReadable,
  fromWebStream,
  openFileSource,
  toByteSource,
  type ByteSourceInput,
} from "./byte-source";
import { FeedRecordParser } from "./engine";
import { SourceError, toSourceError } from "./errors";
import type { FeedParserOptions } from "./options";
import type { RecordStrategy } from "./types";

/**
 * Binds a parser to any byte-readable handle: a ByteSource, a WHATWG
 * ReadableStream, a Node.js Readable, or bytes already in memory.
 */
export function parseRecords<T>(
  input: ByteSourceInput,
  strategy: RecordStrategy<T>,
  options?: FeedParserOptions
): FeedRecordParser<T> {
  return new FeedRecordParser(toByteSource(input), strategy, options);
}

/**
 * Opens a feed file and binds a parser to it. The file is closed when
 * the parse ends or the parser is closed.
 */
export async function openFeedFile<T>(
  path: string,
  strategy: RecordStrategy<T>,
  options?: FeedParserOptions & { chunkSize?: number }
): Promise<FeedRecordParser<T>> {
  const { chunkSize, ...parserOptions } = options ?? {};
  const source = await openFileSource(path, { chunkSize });
  logger.debug("Opened feed file", { path });
  return new FeedRecordParser(source, strategy, parserOptions);
}

/**
 * Binds a parser to an already connected socket.
 * The socket stays owned by the caller.
 */
export function fromSocket<T>(
  socket: Socket,
  strategy: RecordStrategy<T>,
  options?: FeedParserOptions
): FeedRecordParser<T> {
  const description = socket.remoteAddress
    ? `tcp://${socket.remoteAddress}:${socket.remotePort}`
    : "socket";
  return new FeedRecordParser(fromNodeReadable(socket, description), strategy, options);
}

/**
 * Connects to host:port and binds a parser to the connection.
 * Rejects with a SourceError (e.g. code "ECONNREFUSED") when the connection fails.
 * The returned socket is owned by the caller and must be destroyed by it.
 */
export async function connectFeedSocket<T>(
  target: { host: string; port: number },
  strategy: RecordStrategy<T>,
  options?: FeedParserOptions
): Promise<{ parser: FeedRecordParser<T>; socket: Socket }> {
  const socket = await new Promise<Socket>((resolve, reject) => {
    const pending = connect(target.port, target.host);
    const onError = (error: Error) => {
      pending.destroy();
      reject(toSourceError(error, `Cannot connect to ${target.host}:${target.port}`));
    };
    pending.once("error", onError);
    pending.once("connect", () => {
      pending.off("error", onError);
      resolve(pending);
    });
  });

  logger.debug("Connected to feed socket", target);
  return { parser: fromSocket(socket, strategy, options), socket };
}

/**
 * Options for fetchFeedRecords.
 */
export interface FetchFeedRecordsOptions extends FeedParserOptions {
  /** Extra request headers; the User-Agent is set unless given here */
  headers?: Record<string, string>;
  /** Aborts the request and the body stream */
  signal?: AbortSignal;
  /** Product token added to the User-Agent (e.g. "news-digest/2.3") */
  userAgentContext?: string;
}

/**
 * Requests a feed over HTTP and binds a parser to the response body.
 * Rejects with a SourceError on network failure, a non-2xx status or a missing body.
 */
export async function fetchFeedRecords<T>(
  url: string,
  strategy: RecordStrategy<T>,
  options: FetchFeedRecordsOptions = {}
): Promise<FeedRecordParser<T>> {
  const { headers, signal, userAgentContext, ...parserOptions } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        "User-Agent": buildUserAgent({ context: userAgentContext }),
        Accept: "application/rss+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.1",
        ...headers,
      },
      redirect: "follow",
      signal,
    });
  } catch (error) {
    throw toSourceError(error, `Request to ${url} failed`);
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new SourceError(`Request to ${url} failed with HTTP ${response.status}`, {
      statusCode: response.status,
    });
  }

  if (!response.body) {
    throw new SourceError(`Response from ${url} has no body`, { statusCode: response.status });
  }

  logger.debug("Fetched feed response", {
    url,
    finalUrl: response.url,
    contentType: response.headers.get("content-type"),
  });

  return new FeedRecordParser(
    fromWebStream(response.body, { owned: true, description: url }),
    strategy,
    parserOptions
  );
}
