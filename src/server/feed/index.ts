/**
 * Feed parsing module.
 * Exports the incremental record parser and the built-in RSS item strategy.
 */

export type { ParsedEntry } from "./types";
export { rssItemStrategy, parseRssDate } from "./rss-item";
export * from "./streaming";
