/**
 * Generic ingress builder
 *
 * One build pass: extract entries from every route, sort them into
 * first-match-wins order, render them as wire rules. Collaborators are fixed
 * at construction and each pass keeps its state local, so one builder can
 * serve concurrent callers.
 */

import { DEFAULT_CLUSTER_DOMAIN } from '../config/index.js';
import { getComponentLogger, type IngressLogger } from '../logging/index.js';
import { type IngressMetrics, noopMetrics } from '../metrics/index.js';
import type { BackendRefError, BuildResult, RoutingEntry } from '../types/ingress.js';
import type { ReferenceValidator, ServiceReader } from '../types/references.js';
import type { GRPCRoute, HTTPRoute } from '../types/routes.js';
import { grpcRouteAdapter } from './adapters/grpc-route.js';
import { httpRouteAdapter } from './adapters/http-route.js';
import type { RouteAdapter } from './adapters/types.js';
import { BackendResolver } from './backend-resolver.js';
import { renderRules } from './render.js';
import { sortRoutingEntries } from './sort.js';

export interface IngressBuilderOptions {
  /**
   * Cluster DNS suffix used for Service URLs
   * @default 'cluster.local'
   */
  clusterDomain?: string;

  /**
   * Authorizes cross-namespace backend references; all are allowed without one
   */
  validator?: ReferenceValidator;

  /**
   * Reads Services for ExternalName and existence checks; without one every
   * backend resolves through cluster DNS
   */
  serviceReader?: ServiceReader;

  metrics?: IngressMetrics;

  logger?: IngressLogger;

  /**
   * Record backend references of unsupported kinds in `failedRefs`
   * @default false
   */
  reportUnsupportedBackends?: boolean;
}

export interface BuildOptions {
  /**
   * Passed to every Service lookup and reference check
   */
  signal?: AbortSignal;
}

export class IngressBuilder<R> {
  private readonly resolver: BackendResolver;
  private readonly metrics: IngressMetrics;
  private readonly logger: IngressLogger;

  constructor(
    private readonly adapter: RouteAdapter<R>,
    options: IngressBuilderOptions = {}
  ) {
    this.metrics = options.metrics ?? noopMetrics;
    this.logger = (options.logger ?? getComponentLogger('ingress-builder')).child({
      builder: adapter.metricsLabel,
    });
    this.resolver = new BackendResolver({
      clusterDomain: options.clusterDomain ?? DEFAULT_CLUSTER_DOMAIN,
      validator: options.validator,
      serviceReader: options.serviceReader,
      metrics: this.metrics,
      logger: this.logger,
      reportUnsupportedBackends: options.reportUnsupportedBackends ?? false,
    });
  }

  get routeKind(): RouteAdapter<R>['routeKind'] {
    return this.adapter.routeKind;
  }

  /**
   * Convert routes into ordered ingress rules.
   *
   * Never rejects because of a single route: unresolvable backends end up in
   * `failedRefs` and the remaining rules are still produced.
   */
  async build(routes: readonly R[], options: BuildOptions = {}): Promise<BuildResult> {
    const startTime = performance.now();
    const entries: RoutingEntry[] = [];
    const failedRefs: BackendRefError[] = [];

    for (const route of routes) {
      try {
        const extracted = await this.adapter.extractEntries(route, {
          resolver: this.resolver,
          logger: this.logger,
          signal: options.signal,
        });
        entries.push(...extracted.entries);
        failedRefs.push(...extracted.failedRefs);
      } catch (error) {
        const meta = this.adapter.getMeta(route);
        this.logger.error(
          'failed to extract ingress entries, skipping route',
          error instanceof Error ? error : new Error(String(error)),
          { route: `${meta.namespace}/${meta.name}` }
        );
      }
    }

    const rules = renderRules(sortRoutingEntries(entries), this.adapter.addCatchAll);

    this.metrics.recordBuildDuration(this.adapter.metricsLabel, performance.now() - startTime);
    this.logger.debug('built ingress rules', {
      routes: routes.length,
      rules: rules.length,
      failedRefs: failedRefs.length,
    });

    return Object.freeze({
      rules: Object.freeze(rules.map((rule) => Object.freeze(rule))),
      failedRefs: Object.freeze(failedRefs.map((ref) => Object.freeze(ref))),
    });
  }
}

export function createHTTPRouteBuilder(options: IngressBuilderOptions = {}): IngressBuilder<HTTPRoute> {
  return new IngressBuilder(httpRouteAdapter, options);
}

export function createGRPCRouteBuilder(options: IngressBuilderOptions = {}): IngressBuilder<GRPCRoute> {
  return new IngressBuilder(grpcRouteAdapter, options);
}
