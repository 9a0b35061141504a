/**
 * Response rendering: JSON result or the GraphiQL console.
 */

import { toError } from './errors';
import { acceptsHTML, generatePlaygroundHTML } from './playground';
import type { HandlerResult } from './types';

export const JSON_CONTENT_TYPE = 'application/json; charset=utf-8';
export const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';

export interface RenderedJson {
  readonly response: Response;

  /**
   * Exact bytes written as the response body.
   */
  readonly body: Uint8Array;
}

const encoder = new TextEncoder();

/**
 * Decides whether a request gets the console page instead of JSON.
 *
 * Only browser navigations qualify: no `raw` query parameter, an Accept
 * header that names `text/html` and does not name `application/json`.
 * Repeated Accept headers are read as one comma-joined list.
 */
export function shouldRenderPlayground(request: Request, enabled: boolean): boolean {
  if (!enabled) {
    return false;
  }
  if (new URL(request.url).searchParams.has('raw')) {
    return false;
  }
  const accept = request.headers.get('Accept') ?? '';
  return !accept.includes('application/json') && acceptsHTML(request.headers);
}

/**
 * Serializes a result. The status is always 200; execution errors travel in
 * the body.
 */
export function renderJson(
  result: HandlerResult,
  pretty: boolean,
  headers?: Headers
): RenderedJson {
  const json = pretty ? JSON.stringify(result, null, '\t') : JSON.stringify(result);
  const body = encoder.encode(json);

  const responseHeaders = new Headers(headers);
  responseHeaders.set('Content-Type', JSON_CONTENT_TYPE);

  return {
    response: new Response(body, { status: 200, headers: responseHeaders }),
    body,
  };
}

/**
 * Renders the console page. A template failure becomes a 500 carrying the
 * error message.
 */
export function renderPlayground(title: string, headers?: Headers): Response {
  let html: string;
  try {
    html = generatePlaygroundHTML({ title });
  } catch (error) {
    return new Response(toError(error).message, {
      status: 500,
      headers: { 'Content-Type': 'text/plain; charset=utf-8' },
    });
  }

  const responseHeaders = new Headers(headers);
  responseHeaders.set('Content-Type', HTML_CONTENT_TYPE);
  return new Response(html, { status: 200, headers: responseHeaders });
}
