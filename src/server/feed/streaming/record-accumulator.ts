/**
 * Record accumulator: turns tokenizer events into records.
 *
 * Outside a record it waits for the record-boundary element. Inside one, every
 * element opens a field scope collecting text and CDATA; closing the scope
 * hands a RawNode to the strategy. Only the boundary element that opened the
 * record can close it: a same-named element nested inside is an ordinary field.
 */

import type { Logger } from "@/lib/logger";
import type { MarkupEvent, RawNode, RecordStrategy } from "./types";

interface FieldScope {
  tag: string;
  attributes: Record<string, string>;
  text: string[];
  literal: string[] | undefined;
  malformed: boolean;
}

/**
 * A finished record. Boxed so that a record type admitting `undefined`
 * stays distinguishable from "nothing completed yet".
 */
export interface CompletedRecord<T> {
  record: T;
}

export class RecordAccumulator<T> {
  private current: CompletedRecord<T> | null = null;
  private readonly scopes: FieldScope[] = [];
  private boundaryMalformed = false;

  recordsCompleted = 0;
  recordsDiscarded = 0;
  nodesSkipped = 0;

  constructor(
    private readonly recordTag: string,
    private readonly strategy: RecordStrategy<T>,
    private readonly log: Logger
  ) {}

  get state(): "seeking" | "in_record" {
    return this.current ? "in_record" : "seeking";
  }

  /**
   * Applies one event. Returns the record when this event completed it.
   */
  accept(event: MarkupEvent): CompletedRecord<T> | undefined {
    if (!this.current) {
      if (event.kind === "start" && event.name === this.recordTag) {
        this.current = { record: this.strategy.init() };
        this.boundaryMalformed = false;
      }
      return undefined;
    }

    const scope = this.scopes.at(-1);

    switch (event.kind) {
      case "start":
        this.scopes.push({
          tag: event.name,
          attributes: event.attributes,
          text: [],
          literal: undefined,
          malformed: false,
        });
        return undefined;

      case "text":
        scope?.text.push(event.text);
        return undefined;

      case "literal":
        if (scope) {
          scope.literal ??= [];
          scope.literal.push(event.text);
        }
        return undefined;

      case "malformed":
        if (scope?.tag === event.name) {
          scope.malformed = true;
        } else if (!scope && event.name === this.recordTag) {
          this.boundaryMalformed = true;
        }
        return undefined;

      case "end":
        if (scope) {
          if (scope.tag === event.name) this.closeField(scope);
          return undefined;
        }
        if (event.name !== this.recordTag) return undefined;
        return this.closeRecord();
    }
  }

  /**
   * Drops the record in progress, if any. Returns whether one was dropped.
   */
  discard(reason: string): boolean {
    if (!this.current) return false;
    this.log.debug("Discarding incomplete record", { reason, openFields: this.scopes.length });
    this.reset();
    this.recordsDiscarded++;
    return true;
  }

  private closeField(scope: FieldScope): void {
    this.scopes.pop();

    if (scope.malformed) {
      this.nodesSkipped++;
      this.log.debug("Skipping unclosed field", { tag: scope.tag });
      return;
    }

    const text = scope.text.join("").trim();
    const node: RawNode = Object.freeze({
      tag: scope.tag,
      ...(text ? { text } : {}),
      ...(scope.literal ? { literal: scope.literal.join("") } : {}),
      attributes: Object.freeze(scope.attributes),
    });

    if (this.current) {
      this.strategy.populate(this.current.record, node);
    }
  }

  private closeRecord(): CompletedRecord<T> | undefined {
    const completed = this.current;
    if (this.boundaryMalformed || !completed) {
      this.discard("record element was never closed");
      return undefined;
    }

    this.reset();
    this.recordsCompleted++;
    return completed;
  }

  private reset(): void {
    this.current = null;
    this.scopes.length = 0;
    this.boundaryMalformed = false;
  }
}
