/**
 * Payload of an `http_request` bus event.
 *
 * `path` is the raw request target and may carry a query string.
 */
export interface HttpExchange {
  readonly method: string;
  readonly path: string;
  readonly headers: Readonly<Record<string, string | string[] | undefined>>;
  readonly body: unknown;
}

/** Response a bus listener attaches to an `http_request` event. */
export interface HttpResponse {
  readonly status: number;
  readonly contentType: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
}

export const CONTENT_TYPE_JSON = 'application/json';
export const CONTENT_TYPE_HTML = 'text/html';
export const CONTENT_TYPE_CSS = 'text/css';
export const CONTENT_TYPE_JAVASCRIPT = 'application/javascript';
export const CONTENT_TYPE_TEXT = 'text/plain';

export function isHttpExchange(value: unknown): value is HttpExchange {
  if (typeof value !== 'object' || value === null) return false;
  return 'method' in value && typeof value.method === 'string'
    && 'path' in value && typeof value.path === 'string';
}
