import { NO_MATCH } from '../domain/index.js';
import type { RouteMatch } from '../domain/index.js';

export const SYSTEM_INFO_PATH = '/system-info';
export const EVENTS_PATH = '/events';
export const LOGS_PATH = '/logs';
export const CONFIG_PATH = '/config';
export const SERVICE_PATH = '/service';

/** Everything a match needs to know, read once per request. */
export interface RouteContext {
  readonly rootPath: string;
  readonly uiPath: string;
  hasComponent(name: string): boolean;
  hasAsset(fileName: string): boolean;
}

/** Strips the query string and a single trailing slash. */
export function normalizePath(raw: string): string {
  const q = raw.search(/[?#]/);
  const path = q === -1 ? raw : raw.slice(0, q);
  return path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
}

/** Returns the single path segment after `prefix + '/'`, or null. */
function segmentAfter(path: string, prefix: string): string | null {
  if (!path.startsWith(prefix + '/')) return null;
  const rest = path.slice(prefix.length + 1);
  if (rest === '' || rest.includes('/')) return null;
  try {
    return decodeURIComponent(rest);
  } catch {
    return null;
  }
}

/**
 * Resolves a request to one of the console routes.
 *
 * The method plays no part here; the dispatcher decides what each
 * method does on a matched route. `service/{name}` and `{fileName}` only
 * match when the component or asset exists, so unknown names fall
 * through to the host like any foreign path.
 */
export function matchRoute(request: { path: string }, ctx: RouteContext): RouteMatch {
  const path = normalizePath(request.path);
  const root = ctx.rootPath;

  if (path === root + SYSTEM_INFO_PATH) return { kind: 'system-info' };
  if (path === root + EVENTS_PATH) return { kind: 'events' };
  if (path === root + LOGS_PATH) return { kind: 'logs' };
  if (path === root + CONFIG_PATH) return { kind: 'config' };

  const name = segmentAfter(path, root + SERVICE_PATH);
  if (name !== null && ctx.hasComponent(name)) {
    return { kind: 'service', name };
  }

  if (path === root || path === root + ctx.uiPath) return { kind: 'dashboard' };

  const fileName = segmentAfter(path, root);
  if (fileName !== null && ctx.hasAsset(fileName)) {
    return { kind: 'asset', fileName };
  }

  return NO_MATCH;
}
