/**
 * PII scrubbing applied at ingest.
 */

export const EMAIL_REDACTION = '<EMAIL>';

const EMAIL_PATTERN = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g;

/**
 * Replace email-like substrings with a fixed marker. Irreversible.
 */
export function scrubPII(text: string): string {
  return text.replace(EMAIL_PATTERN, EMAIL_REDACTION);
}

export function containsEmail(text: string): boolean {
  return new RegExp(EMAIL_PATTERN.source).test(text);
}
