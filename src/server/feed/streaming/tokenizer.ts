/**
 * Pull-based markup tokenizer over htmlparser2's SAX-style Parser.
 * Bytes go in through feed(); events come out one at a time through next(),
 * which answers "need-more" instead of failing when the queued events run out.
 */

import { Parser } from "htmlparser2";
import { decode } from "html-entities";
import type { MarkupEvent, TokenizerResult } from "./types";

export class MarkupTokenizer {
  private readonly queue: MarkupEvent[] = [];
  private readonly decoder = new TextDecoder("utf-8");
  private readonly parser: Parser;

  /** Text seen since the last non-text callback, not yet decoded */
  private pendingText = "";
  /** CDATA content being collected; null outside a CDATA section */
  private literal: string | null = null;
  /** Element opened by the most recent event, if nothing followed it */
  private lastOpened: { tag: string; startIndex: number } | null = null;
  private finishing = false;
  private finished = false;

  constructor() {
    this.parser = new Parser(
      {
        onopentag: (name, attribs) => {
          this.flushText();
          const tag = name.toLowerCase();
          this.queue.push({ kind: "start", name: tag, attributes: decodeAttributes(attribs) });
          this.lastOpened = { tag, startIndex: this.parser.startIndex };
        },

        ontext: (text) => {
          this.lastOpened = null;
          if (this.literal !== null) {
            this.literal += text;
          } else {
            this.pendingText += text;
          }
        },

        oncdatastart: () => {
          this.flushText();
          this.lastOpened = null;
          this.literal = "";
        },

        oncdataend: () => {
          this.queue.push({ kind: "literal", text: this.literal ?? "" });
          this.literal = null;
        },

        onclosetag: (name, isImplied) => {
          // Elements still open when input ends were never closed
          if (this.finishing && isImplied) return;

          this.flushText();
          const tag = name.toLowerCase();
          if (isImplied && !this.closesSelfClosingTag(tag)) {
            this.queue.push({ kind: "malformed", name: tag });
          }
          this.queue.push({ kind: "end", name: tag });
          this.lastOpened = null;
        },
      },
      {
        xmlMode: true,
        decodeEntities: false,
        lowerCaseTags: true,
        lowerCaseAttributeNames: true,
        recognizeCDATA: true,
        recognizeSelfClosing: true,
      }
    );
  }

  /**
   * Hands the next bytes to the lexer. Multi-byte characters split
   * across calls are reassembled by the streaming decoder.
   */
  feed(bytes: Uint8Array): void {
    if (this.finishing) {
      throw new Error("Cannot feed a tokenizer after finish()");
    }
    const chunk = this.decoder.decode(bytes, { stream: true });
    if (chunk) this.parser.write(chunk);
  }

  /** Signals end of input and flushes whatever the lexer still holds. */
  finish(): void {
    if (this.finishing) return;
    this.finishing = true;
    const tail = this.decoder.decode();
    if (tail) this.parser.write(tail);
    this.parser.end();
    this.flushText();
    this.finished = true;
  }

  next(): TokenizerResult {
    const event = this.queue.shift();
    if (event) return event;
    return this.finished ? { kind: "end-of-input" } : { kind: "need-more" };
  }

  /** A self-closing element is opened and closed by the same `<name/>` token. */
  private closesSelfClosingTag(tag: string): boolean {
    return (
      this.lastOpened !== null &&
      this.lastOpened.tag === tag &&
      this.lastOpened.startIndex === this.parser.startIndex
    );
  }

  private flushText(): void {
    if (this.pendingText === "") return;
    this.queue.push({ kind: "text", text: decode(this.pendingText) });
    this.pendingText = "";
  }
}

function decodeAttributes(attribs: Record<string, string>): Record<string, string> {
  const decoded: Record<string, string> = {};
  for (const [name, value] of Object.entries(attribs)) {
    decoded[name] = decode(value);
  }
  return decoded;
}
