import { PathPriority } from '../../types/ingress.js';
import type { GRPCMethodMatch, GRPCRoute, GRPCRouteMatch } from '../../types/routes.js';
import { PARTIALLY_APPLIED } from '../constants.js';
import { extractRouteEntries, hostnamesOrWildcard, type PathMatch } from './shared.js';
import type { ExtractionContext, ExtractionResult, RouteAdapter, RouteMeta } from './types.js';

/**
 * gRPC calls are HTTP/2 POSTs to `/<package.Service>/<Method>`, so a method
 * match becomes a path:
 *
 * - service and method: exact `/<service>/<method>`
 * - service only: prefix `/<service>/`
 * - method only, or neither: the whole host
 */
export function extractGRPCPath(methodMatch: GRPCMethodMatch | undefined): PathMatch {
  const service = methodMatch?.service ?? '';
  const method = methodMatch?.method ?? '';

  if (service === '') {
    return { path: '', priority: PathPriority.Prefix };
  }

  if (method === '') {
    return { path: `/${service}/`, priority: PathPriority.Prefix };
  }

  return { path: `/${service}/${method}`, priority: PathPriority.Exact };
}

export class GRPCRouteAdapter implements RouteAdapter<GRPCRoute> {
  readonly routeKind = 'GRPCRoute';
  readonly metricsLabel = 'grpc';
  readonly addCatchAll = false;

  getMeta(route: GRPCRoute): RouteMeta {
    return {
      namespace: route.metadata.namespace ?? 'default',
      name: route.metadata.name ?? '',
    };
  }

  getHostnames(route: GRPCRoute): string[] {
    return hostnamesOrWildcard(route.spec.hostnames);
  }

  extractEntries(route: GRPCRoute, context: ExtractionContext): Promise<ExtractionResult> {
    const meta = this.getMeta(route);
    const routeKey = `${meta.namespace}/${meta.name}`;

    return extractRouteEntries(
      { kind: this.routeKind, metricsLabel: this.metricsLabel, ...meta },
      this.getHostnames(route),
      route.spec.rules ?? [],
      (match: GRPCRouteMatch) => {
        if (match.headers && match.headers.length > 0) {
          context.logger.info(PARTIALLY_APPLIED, {
            route: routeKey,
            reason: 'header matching not supported by Cloudflare Tunnel',
            ignored_headers: match.headers.length,
          });
        }
        return extractGRPCPath(match.method);
      },
      context
    );
  }
}

export const grpcRouteAdapter = new GRPCRouteAdapter();
