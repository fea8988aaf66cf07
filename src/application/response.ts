import {
  CONTENT_TYPE_CSS,
  CONTENT_TYPE_HTML,
  CONTENT_TYPE_JAVASCRIPT,
  CONTENT_TYPE_TEXT,
} from '../domain/index.js';
import type { HttpResponse } from '../domain/index.js';

export const CORS_HEADERS: Readonly<Record<string, string>> = {
  'access-control-allow-origin': '*',
  'access-control-allow-methods': 'GET, PATCH, DELETE, OPTIONS',
  'access-control-allow-headers': 'Content-Type',
};

/** The one constructor every console response goes through. */
export function responseOk(contentType: string, body: string): HttpResponse {
  return {
    status: 200,
    contentType,
    headers: { ...CORS_HEADERS },
    body,
  };
}

const TYPES_BY_EXTENSION: Readonly<Record<string, string>> = {
  html: CONTENT_TYPE_HTML,
  css: CONTENT_TYPE_CSS,
  js: CONTENT_TYPE_JAVASCRIPT,
};

export function contentTypeFor(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  const ext = dot === -1 ? '' : fileName.slice(dot + 1).toLowerCase();
  return TYPES_BY_EXTENSION[ext] ?? CONTENT_TYPE_TEXT;
}
