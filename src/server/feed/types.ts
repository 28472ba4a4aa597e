/**
 * Record type produced by the built-in RSS item strategy.
 */

/**
 * A parsed RSS item.
 */
export interface ParsedEntry {
  /** Unique identifier for the entry */
  guid?: string;
  /** URL link to the entry */
  link?: string;
  /** Entry title */
  title?: string;
  /** Author name (dc:creator preferred over author) */
  author?: string;
  /** Full content of the entry (content:encoded, else description) */
  content?: string;
  /** Summary/description of the entry */
  summary?: string;
  /** Publication date of the entry (pubDate, else dc:date) */
  pubDate?: Date;
  /** Category labels, in document order */
  categories: string[];
}
