/**
 * Shared utilities for the tagging pipeline
 */

/**
 * Parse JSON text; undefined when it is not valid JSON
 */
export function safeJsonParse(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    return undefined;
  }
}

/**
 * Decode an object key as it appears in an S3 event notification
 * (form-encoded: spaces arrive as '+').
 */
export function decodeS3Key(key: string): string {
  return decodeURIComponent(key.replace(/\+/g, ' '));
}

/**
 * Non-empty string guard
 */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}
