/**
 * Result of matching an inbound request against the console routes.
 *
 * Produced per request and dropped after dispatch.
 */
export type RouteMatch =
  | { readonly kind: 'system-info' }
  | { readonly kind: 'events' }
  | { readonly kind: 'logs' }
  | { readonly kind: 'config' }
  | { readonly kind: 'service'; readonly name: string }
  | { readonly kind: 'dashboard' }
  | { readonly kind: 'asset'; readonly fileName: string }
  | { readonly kind: 'none' };

export type RouteKind = RouteMatch['kind'];

export const NO_MATCH: RouteMatch = { kind: 'none' };
