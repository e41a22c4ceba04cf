/**
 * Cookie jar validation for acquisition credentials.
 */

import { ValidationError } from './errors/index.js';

export const COOKIE_JAR_HEADERS = ['# Netscape HTTP Cookie File', '# HTTP Cookie File'] as const;

export const MAX_COOKIE_JAR_BYTES = 1024 * 1024;

/**
 * Validate a cookie jar in the extractor's textual format and return it normalised
 * (leading byte-order mark removed, trailing newline ensured).
 */
export function validateCookieJar(data: string): string {
  const text = data.replace(/^\uFEFF/, '');

  if (Buffer.byteLength(text, 'utf8') > MAX_COOKIE_JAR_BYTES) {
    throw new ValidationError('cookies', `cookie file exceeds ${MAX_COOKIE_JAR_BYTES} bytes`);
  }

  if (!COOKIE_JAR_HEADERS.some((header) => text.startsWith(header))) {
    throw new ValidationError('cookies', 'expected a Netscape format cookie file');
  }

  return text.endsWith('\n') ? text : `${text}\n`;
}
