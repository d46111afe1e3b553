/**
 * Ids correlating the log lines of one CLI invocation.
 */

import { randomUUID } from "node:crypto";

const SHORT_ID_LENGTH = 8;

/** First eight hex digits of a random UUID v4, e.g. "3f2a9c1e". */
export function generateInvocationId(): string {
  return randomUUID().replace(/-/g, "").slice(0, SHORT_ID_LENGTH);
}
