import type { IngressLogger } from '../../logging/index.js';
import { PathPriority } from '../../types/ingress.js';
import type { HTTPPathMatch, HTTPRoute, HTTPRouteMatch } from '../../types/routes.js';
import { PARTIALLY_APPLIED } from '../constants.js';
import { extractRouteEntries, hostnamesOrWildcard, type PathMatch } from './shared.js';
import type { ExtractionContext, ExtractionResult, RouteAdapter, RouteMeta } from './types.js';

function logUnsupportedMatchFeatures(logger: IngressLogger, routeKey: string, match: HTTPRouteMatch): void {
  if (match.headers && match.headers.length > 0) {
    logger.info(PARTIALLY_APPLIED, {
      route: routeKey,
      reason: 'header matching not supported by Cloudflare Tunnel',
      ignored_headers: match.headers.length,
    });
  }

  if (match.queryParams && match.queryParams.length > 0) {
    logger.info(PARTIALLY_APPLIED, {
      route: routeKey,
      reason: 'query parameter matching not supported by Cloudflare Tunnel',
      ignored_params: match.queryParams.length,
    });
  }

  if (match.method !== undefined) {
    logger.info(PARTIALLY_APPLIED, {
      route: routeKey,
      reason: 'method matching not supported by Cloudflare Tunnel',
      ignored_method: match.method,
    });
  }
}

/**
 * Map an HTTP path match onto a path and priority. RegularExpression matches
 * keep their pattern text but are matched as a prefix.
 */
export function extractHTTPPath(
  logger: IngressLogger,
  routeKey: string,
  pathMatch: HTTPPathMatch | undefined
): PathMatch {
  if (!pathMatch) {
    return { path: '', priority: PathPriority.Prefix };
  }

  const path = pathMatch.value ?? '/';

  switch (pathMatch.type ?? 'PathPrefix') {
    case 'Exact':
      return { path, priority: PathPriority.Exact };
    case 'RegularExpression':
      logger.warn(PARTIALLY_APPLIED, {
        route: routeKey,
        reason: 'RegularExpression path type treated as PathPrefix',
        path,
      });
      return { path, priority: PathPriority.Prefix };
    default:
      return { path, priority: PathPriority.Prefix };
  }
}

export class HTTPRouteAdapter implements RouteAdapter<HTTPRoute> {
  readonly routeKind = 'HTTPRoute';
  readonly metricsLabel = 'http';
  readonly addCatchAll = true;

  getMeta(route: HTTPRoute): RouteMeta {
    return {
      namespace: route.metadata.namespace ?? 'default',
      name: route.metadata.name ?? '',
    };
  }

  getHostnames(route: HTTPRoute): string[] {
    return hostnamesOrWildcard(route.spec.hostnames);
  }

  extractEntries(route: HTTPRoute, context: ExtractionContext): Promise<ExtractionResult> {
    const meta = this.getMeta(route);
    const routeKey = `${meta.namespace}/${meta.name}`;

    return extractRouteEntries(
      { kind: this.routeKind, metricsLabel: this.metricsLabel, ...meta },
      this.getHostnames(route),
      route.spec.rules ?? [],
      (match: HTTPRouteMatch) => {
        logUnsupportedMatchFeatures(context.logger, routeKey, match);
        return extractHTTPPath(context.logger, routeKey, match.path);
      },
      context
    );
  }
}

export const httpRouteAdapter = new HTTPRouteAdapter();
