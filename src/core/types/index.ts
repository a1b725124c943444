export {
  type BackendRefError,
  type BackendRefReason,
  type BuildResult,
  CATCH_ALL_SERVICE,
  type ComparableRule,
  PathPriority,
  type RoutingEntry,
  WILDCARD_HOSTNAME,
  type WireRule,
} from './ingress.js';
export type { BackendService, Reference, ReferenceValidator, ServiceReader } from './references.js';
export {
  type BackendRef,
  GATEWAY_API_GROUP,
  type GRPCBackendRef,
  type GRPCMethodMatch,
  type GRPCRoute,
  type GRPCRouteMatch,
  type GRPCRouteRule,
  type GRPCRouteSpec,
  type HeaderMatch,
  type HTTPBackendRef,
  type HTTPMethod,
  type HTTPPathMatch,
  type HTTPPathMatchType,
  type HTTPQueryParamMatch,
  type HTTPRoute,
  type HTTPRouteMatch,
  type HTTPRouteRule,
  type HTTPRouteSpec,
  type ParentReference,
  type RouteFilter,
  type RouteKind,
} from './routes.js';
