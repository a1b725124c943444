import type { IngressLogger } from '../../logging/index.js';
import type { RouteKindLabel } from '../../metrics/index.js';
import type { BackendRefError, RoutingEntry } from '../../types/ingress.js';
import type { RouteKind } from '../../types/routes.js';
import type { BackendResolver } from '../backend-resolver.js';

export interface RouteMeta {
  namespace: string;
  name: string;
}

export interface ExtractionContext {
  resolver: BackendResolver;
  logger: IngressLogger;
  signal?: AbortSignal;
}

export interface ExtractionResult {
  entries: RoutingEntry[];
  failedRefs: BackendRefError[];
}

/**
 * Capabilities of one route kind. The builder is generic over this; the two
 * kinds differ only in how a match becomes a path and whether the catch-all
 * is appended.
 */
export interface RouteAdapter<R> {
  readonly routeKind: RouteKind;
  readonly metricsLabel: RouteKindLabel;
  /**
   * Whether a build of this kind ends with the catch-all rule. Kinds without
   * it are merged into a catch-all-terminated list by the caller.
   */
  readonly addCatchAll: boolean;

  getMeta(route: R): RouteMeta;

  /**
   * Hostnames of the route; `['*']` when it declares none
   */
  getHostnames(route: R): string[];

  extractEntries(route: R, context: ExtractionContext): Promise<ExtractionResult>;
}
