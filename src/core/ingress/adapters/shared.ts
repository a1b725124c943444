import {
  type BackendRefError,
  PathPriority,
  type RoutingEntry,
  WILDCARD_HOSTNAME,
} from '../../types/ingress.js';
import type { BackendRef, RouteFilter } from '../../types/routes.js';
import { PARTIALLY_APPLIED } from '../constants.js';
import type { RouteIdentity } from '../backend-resolver.js';
import type { ExtractionContext, ExtractionResult } from './types.js';

export interface PathMatch {
  path: string;
  priority: PathPriority;
}

export interface RuleShape<M> {
  matches?: M[];
  filters?: RouteFilter[];
  backendRefs?: BackendRef[];
}

export function hostnamesOrWildcard(hostnames: string[] | undefined): string[] {
  return hostnames && hostnames.length > 0 ? hostnames : [WILDCARD_HOSTNAME];
}

/**
 * Walk hostnames x rules x matches of one route.
 *
 * Each rule's backends are resolved once, so a failed reference is reported
 * once per rule no matter how many hostnames the route has. A rule without
 * a resolved service contributes no entries. A rule without matches covers the
 * whole host.
 */
export async function extractRouteEntries<M>(
  route: RouteIdentity,
  hostnames: string[],
  rules: RuleShape<M>[],
  toPathMatch: (match: M) => PathMatch,
  context: ExtractionContext
): Promise<ExtractionResult> {
  const { resolver, logger, signal } = context;
  const failedRefs: BackendRefError[] = [];
  const resolved: { service: string; matches: PathMatch[] }[] = [];

  for (const rule of rules) {
    if (rule.filters && rule.filters.length > 0) {
      logger.info(PARTIALLY_APPLIED, {
        route: `${route.namespace}/${route.name}`,
        reason: 'filters not supported by Cloudflare Tunnel',
        ignored_filters: rule.filters.length,
      });
    }

    const resolution = await resolver.resolve(route, rule.backendRefs ?? [], signal);
    if (resolution.status === 'failed') {
      failedRefs.push(resolution.error);
      continue;
    }
    if (resolution.status === 'omitted') {
      continue;
    }

    const matches = rule.matches ?? [];
    resolved.push({
      service: resolution.service,
      matches:
        matches.length === 0
          ? [{ path: '', priority: PathPriority.Prefix }]
          : matches.map((match) => toPathMatch(match)),
    });
  }

  const entries: RoutingEntry[] = [];
  for (const hostname of hostnames) {
    for (const { service, matches } of resolved) {
      for (const { path, priority } of matches) {
        entries.push({ hostname, path, service, priority });
      }
    }
  }

  return { entries, failedRefs };
}
