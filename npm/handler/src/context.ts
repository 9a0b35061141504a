/**
 * Default per-request context.
 */

import type { BaseContext } from './types';

const UNKNOWN_CLIENT = '0.0.0.0';

/**
 * Creates a base context from an incoming request.
 */
export function createBaseContext(request: Request): BaseContext {
  const { headers } = request;
  return {
    request: {
      headers,
      cookies: parseCookies(headers.get('cookie') ?? ''),
      ip: clientAddress(headers),
      method: request.method,
      url: request.url,
    },
    signal: request.signal,
  };
}

/**
 * Splits a `Cookie` header into name/value pairs. Pairs without a name are
 * skipped; values keep any `=` they contain.
 */
export function parseCookies(header: string): ReadonlyMap<string, string> {
  const pairs = header
    .split(';')
    .map((pair): [string, string] => {
      const separator = pair.indexOf('=');
      return separator === -1
        ? [pair.trim(), '']
        : [pair.slice(0, separator).trim(), pair.slice(separator + 1).trim()];
    })
    .filter(([name]) => name !== '');
  return new Map(pairs);
}

// First hop of X-Forwarded-For, then X-Real-IP.
function clientAddress(headers: Headers): string {
  const [firstHop = ''] = (headers.get('x-forwarded-for') ?? '').split(',');
  return firstHop.trim() || headers.get('x-real-ip') || UNKNOWN_CLIENT;
}
