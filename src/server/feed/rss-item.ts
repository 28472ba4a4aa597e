/**
 * Field dispatch for RSS 2.0 items.
 * Maps item child elements onto a ParsedEntry as they are parsed.
 */

import { nodeValue } from "./streaming/strategy";
import type { RecordStrategy } from "./streaming/types";
import type { ParsedEntry } from "./types";

export const rssItemStrategy: RecordStrategy<ParsedEntry> = {
  init: () => ({ categories: [] }),

  populate(entry, node) {
    const raw = nodeValue(node);
    const value = raw?.trim() || undefined;

    switch (node.tag) {
      case "title":
        entry.title = value;
        break;
      case "link":
        entry.link = value;
        break;
      case "description":
        entry.summary = value;
        // content:encoded takes precedence whichever order the two arrive in
        entry.content ??= value;
        break;
      case "content:encoded":
        if (value) entry.content = value;
        break;
      case "guid":
        entry.guid = value;
        break;
      case "author":
        entry.author ??= value;
        break;
      case "dc:creator":
        if (value) entry.author = value;
        break;
      case "pubdate": {
        const date = parseRssDate(value);
        if (date) entry.pubDate = date;
        break;
      }
      case "dc:date":
        entry.pubDate ??= parseRssDate(value);
        break;
      case "category":
        if (value) entry.categories.push(value);
        break;
    }
  },
};

// "Mon, 01 Jan 2024 12:00:00" with no zone; the Date parser would read it as local time
const RFC_822_WITHOUT_ZONE =
  /^(?:[A-Za-z]{3},\s*)?\d{1,2}\s+[A-Za-z]{3}\s+\d{4}\s+\d{2}:\d{2}(?::\d{2})?$/;

/**
 * Parses an RFC 822 or ISO 8601 date. RFC 822 dates missing a zone are taken as GMT.
 */
export function parseRssDate(dateString: string | undefined): Date | undefined {
  const trimmed = dateString?.trim();
  if (!trimmed) {
    return undefined;
  }

  const date = new Date(RFC_822_WITHOUT_ZONE.test(trimmed) ? `${trimmed} GMT` : trimmed);
  return isNaN(date.getTime()) ? undefined : date;
}
