/**
 * URL helpers shared by source resolution and downloading.
 */

const LITERAL_URL_PROTOCOLS = new Set(['http:', 'https:', 'file:']);

/** True when the value is an absolute http(s) or file URL */
export function isLiteralUrl(value: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return false;
  }
  return LITERAL_URL_PROTOCOLS.has(parsed.protocol);
}

/** Replace a query string, which may carry credentials, before logging */
export function redactUrl(url: string): string {
  const idx = url.indexOf('?');
  return idx >= 0 ? `${url.slice(0, idx)}?[REDACTED]` : url;
}

export function trimTrailingSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}
