/**
 * Gateway API route shapes consumed by the compiler.
 *
 * Only the fields the compiler reads (or detects as unsupported) are modelled.
 * Objects read from the cluster carry more; extra fields are ignored.
 */

import type { V1ObjectMeta } from '@kubernetes/client-node';

export const GATEWAY_API_GROUP = 'gateway.networking.k8s.io';

export type RouteKind = 'HTTPRoute' | 'GRPCRoute';

/**
 * A reference from a route rule to a backend object
 */
export interface BackendRef {
  /** Empty (or the `core` alias) for core resources */
  group?: string;
  /** Defaults to `Service` */
  kind?: string;
  name: string;
  /** Defaults to the route's namespace */
  namespace?: string;
  port?: number;
  /** Defaults to 1; 0 disables the backend */
  weight?: number;
}

/**
 * Filters are never applied by the tunnel; only their presence matters.
 */
export interface RouteFilter {
  type: string;
  [field: string]: unknown;
}

export interface HeaderMatch {
  type?: 'Exact' | 'RegularExpression';
  name: string;
  value: string;
}

export interface ParentReference {
  group?: string;
  kind?: string;
  namespace?: string;
  name: string;
  sectionName?: string;
  port?: number;
}

// =============================================================================
// HTTPRoute
// =============================================================================

export type HTTPPathMatchType = 'Exact' | 'PathPrefix' | 'RegularExpression';

export interface HTTPPathMatch {
  /** Defaults to `PathPrefix` */
  type?: HTTPPathMatchType;
  /** Defaults to `/` */
  value?: string;
}

export interface HTTPQueryParamMatch {
  type?: 'Exact' | 'RegularExpression';
  name: string;
  value: string;
}

export type HTTPMethod =
  | 'GET'
  | 'HEAD'
  | 'POST'
  | 'PUT'
  | 'DELETE'
  | 'CONNECT'
  | 'OPTIONS'
  | 'TRACE'
  | 'PATCH';

export interface HTTPRouteMatch {
  path?: HTTPPathMatch;
  headers?: HeaderMatch[];
  queryParams?: HTTPQueryParamMatch[];
  method?: HTTPMethod;
}

export interface HTTPBackendRef extends BackendRef {
  filters?: RouteFilter[];
}

export interface HTTPRouteRule {
  name?: string;
  matches?: HTTPRouteMatch[];
  filters?: RouteFilter[];
  backendRefs?: HTTPBackendRef[];
}

export interface HTTPRouteSpec {
  parentRefs?: ParentReference[];
  hostnames?: string[];
  rules?: HTTPRouteRule[];
}

export interface HTTPRoute {
  apiVersion?: string;
  kind?: 'HTTPRoute';
  metadata: V1ObjectMeta;
  spec: HTTPRouteSpec;
}

// =============================================================================
// GRPCRoute
// =============================================================================

export interface GRPCMethodMatch {
  type?: 'Exact' | 'RegularExpression';
  service?: string;
  method?: string;
}

export interface GRPCRouteMatch {
  method?: GRPCMethodMatch;
  headers?: HeaderMatch[];
}

export interface GRPCBackendRef extends BackendRef {
  filters?: RouteFilter[];
}

export interface GRPCRouteRule {
  name?: string;
  matches?: GRPCRouteMatch[];
  filters?: RouteFilter[];
  backendRefs?: GRPCBackendRef[];
}

export interface GRPCRouteSpec {
  parentRefs?: ParentReference[];
  hostnames?: string[];
  rules?: GRPCRouteRule[];
}

export interface GRPCRoute {
  apiVersion?: string;
  kind?: 'GRPCRoute';
  metadata: V1ObjectMeta;
  spec: GRPCRouteSpec;
}
