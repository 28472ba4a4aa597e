/**
 * User-Agent header utilities.
 *
 * Provides a standardized User-Agent string for outgoing feed requests.
 *
 * Format: Feedpull/1.0 [context] (+PROJECT_URL; EMAIL)
 */

import { fetcherConfig } from "../config/env";

/**
 * App name and base version.
 */
const APP_NAME_VERSION = "Feedpull/1.0";

/**
 * Options for building a User-Agent string.
 */
export interface UserAgentOptions {
  /**
   * Optional context to include in the User-Agent, such as the integrator's
   * own product token.
   * Example: "news-digest/2.3"
   */
  context?: string;
}

/**
 * Builds a standardized User-Agent string for outgoing HTTP requests.
 *
 * @example
 * buildUserAgent()
 * // => "Feedpull/1.0 (+https://www.npmjs.com/package/feedpull)"
 *
 * @example
 * buildUserAgent({ context: "news-digest/2.3" })
 * // => "Feedpull/1.0 news-digest/2.3 (+https://www.npmjs.com/package/feedpull)"
 */
export function buildUserAgent(options?: UserAgentOptions): string {
  let ua = APP_NAME_VERSION;

  if (options?.context) {
    ua += ` ${options.context}`;
  }

  // Project URL gets the + prefix as primary contact point
  const parts: string[] = [`+${fetcherConfig.projectUrl}`];

  if (fetcherConfig.contactEmail) {
    parts.push(fetcherConfig.contactEmail);
  }

  ua += ` (${parts.join("; ")})`;

  return ua;
}
