export { extractGRPCPath, GRPCRouteAdapter, grpcRouteAdapter } from './grpc-route.js';
export { extractHTTPPath, HTTPRouteAdapter, httpRouteAdapter } from './http-route.js';
export { extractRouteEntries, hostnamesOrWildcard } from './shared.js';
export type { PathMatch, RuleShape } from './shared.js';
export type { ExtractionContext, ExtractionResult, RouteAdapter, RouteMeta } from './types.js';
