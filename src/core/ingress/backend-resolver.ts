/**
 * Backend reference resolution
 *
 * Turns the backend references of one route rule into a single service URL,
 * a silent omission, or a reportable failure.
 */

import type { IngressLogger } from '../logging/index.js';
import { isNotFoundError } from '../kubernetes/errors.js';
import type { IngressMetrics, RouteKindLabel } from '../metrics/index.js';
import type { BackendRefError, BackendRefReason } from '../types/ingress.js';
import type { Reference, ReferenceValidator, ServiceReader } from '../types/references.js';
import { type BackendRef, GATEWAY_API_GROUP, type RouteKind } from '../types/routes.js';
import {
  BACKEND_GROUP_CORE,
  BACKEND_GROUP_CORE_ALIAS,
  BACKEND_KIND_SERVICE,
  DEFAULT_BACKEND_WEIGHT,
  DEFAULT_HTTP_PORT,
  DEFAULT_HTTPS_PORT,
  PARTIALLY_APPLIED,
  SERVICE_TYPE_EXTERNAL_NAME,
} from './constants.js';
import { NO_BACKEND_SELECTED, selectHighestWeightIndex } from './weight.js';

export interface RouteIdentity {
  kind: RouteKind;
  metricsLabel: RouteKindLabel;
  namespace: string;
  name: string;
}

export type BackendResolution =
  | { status: 'resolved'; service: string }
  | { status: 'omitted' }
  | { status: 'failed'; error: BackendRefError };

export interface BackendResolverOptions {
  clusterDomain: string;
  /** Without a validator every cross-namespace reference is allowed */
  validator?: ReferenceValidator;
  /** Without a reader every backend resolves through cluster DNS */
  serviceReader?: ServiceReader;
  metrics: IngressMetrics;
  logger: IngressLogger;
  /** Record unsupported backend kinds as `InvalidKind` instead of dropping them silently */
  reportUnsupportedBackends: boolean;
}

interface SelectedBackend {
  name: string;
  namespace: string;
  port: number;
}

function routeKey(route: RouteIdentity): string {
  return `${route.namespace}/${route.name}`;
}

function isCoreGroup(group: string | undefined): boolean {
  return group === undefined || group === BACKEND_GROUP_CORE || group === BACKEND_GROUP_CORE_ALIAS;
}

export class BackendResolver {
  constructor(private readonly options: BackendResolverOptions) {}

  async resolve(
    route: RouteIdentity,
    refs: readonly BackendRef[],
    signal?: AbortSignal
  ): Promise<BackendResolution> {
    if (refs.length === 0) {
      return { status: 'omitted' };
    }

    this.logIgnoredBackends(route, refs);

    const selectedIdx = selectHighestWeightIndex(refs);
    const ref = refs[selectedIdx];
    if (selectedIdx === NO_BACKEND_SELECTED || ref === undefined) {
      return { status: 'omitted' };
    }

    const backend: SelectedBackend = {
      name: ref.name,
      namespace: ref.namespace ?? route.namespace,
      port: ref.port ?? DEFAULT_HTTP_PORT,
    };

    if (!isCoreGroup(ref.group) || (ref.kind !== undefined && ref.kind !== BACKEND_KIND_SERVICE)) {
      if (!this.options.reportUnsupportedBackends) {
        return { status: 'omitted' };
      }
      const kind = `${ref.group ?? BACKEND_GROUP_CORE}/${ref.kind ?? BACKEND_KIND_SERVICE}`;
      return this.record(
        route,
        this.failure(
          route,
          backend,
          'InvalidKind',
          `backend reference kind ${kind} is not supported, only core Services can be routed`
        )
      );
    }

    return this.record(route, await this.resolveService(route, backend, signal));
  }

  private async resolveService(
    route: RouteIdentity,
    backend: SelectedBackend,
    signal?: AbortSignal
  ): Promise<BackendResolution> {
    if (backend.namespace !== route.namespace) {
      const allowed = await this.isCrossNamespaceAllowed(route, backend, signal);
      if (!allowed) {
        return this.failure(
          route,
          backend,
          'RefNotPermitted',
          `cross-namespace backend reference to ${backend.namespace}/${backend.name} not permitted by ReferenceGrant`
        );
      }
    }

    const scheme = backend.port === DEFAULT_HTTPS_PORT ? 'https' : 'http';
    const { serviceReader, logger } = this.options;

    if (serviceReader) {
      try {
        const service = await serviceReader.getService(backend.namespace, backend.name, signal);
        if (service.type === SERVICE_TYPE_EXTERNAL_NAME) {
          if (service.externalName) {
            return {
              status: 'resolved',
              service: `${scheme}://${service.externalName}:${backend.port}`,
            };
          }
          logger.warn('ExternalName Service has no externalName, using cluster-local DNS', {
            service: `${backend.namespace}/${backend.name}`,
          });
        }
      } catch (error) {
        if (isNotFoundError(error)) {
          return this.failure(
            route,
            backend,
            'BackendNotFound',
            `Service ${backend.namespace}/${backend.name} not found`
          );
        }
        logger.warn('failed to fetch Service, using cluster-local DNS', {
          service: `${backend.namespace}/${backend.name}`,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return {
      status: 'resolved',
      service: `${scheme}://${backend.name}.${backend.namespace}.svc.${this.options.clusterDomain}:${backend.port}`,
    };
  }

  private async isCrossNamespaceAllowed(
    route: RouteIdentity,
    backend: SelectedBackend,
    signal?: AbortSignal
  ): Promise<boolean> {
    const { validator, logger } = this.options;
    if (!validator) {
      return true;
    }

    const from: Reference = {
      group: GATEWAY_API_GROUP,
      kind: route.kind,
      namespace: route.namespace,
      name: route.name,
    };
    const to: Reference = {
      group: BACKEND_GROUP_CORE,
      kind: BACKEND_KIND_SERVICE,
      namespace: backend.namespace,
      name: backend.name,
    };

    let allowed: boolean;
    try {
      allowed = await validator.isReferenceAllowed(from, to, signal);
    } catch (error) {
      logger.info(PARTIALLY_APPLIED, {
        route: routeKey(route),
        reason: 'failed to validate cross-namespace reference',
        target: `${backend.namespace}/${backend.name}`,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }

    if (!allowed) {
      logger.info(PARTIALLY_APPLIED, {
        route: routeKey(route),
        reason: 'cross-namespace backend reference not permitted by ReferenceGrant',
        target: `${backend.namespace}/${backend.name}`,
      });
    }
    return allowed;
  }

  private failure(
    route: RouteIdentity,
    backend: SelectedBackend,
    reasonCode: BackendRefReason,
    message: string
  ): BackendResolution {
    return {
      status: 'failed',
      error: {
        routeNamespace: route.namespace,
        routeName: route.name,
        backendName: backend.name,
        backendNamespace: backend.namespace,
        reasonCode,
        message,
      },
    };
  }

  private record(route: RouteIdentity, resolution: BackendResolution): BackendResolution {
    if (resolution.status === 'failed') {
      this.options.metrics.recordBackendRefValidation(
        route.metricsLabel,
        'failed',
        resolution.error.reasonCode
      );
    } else if (resolution.status === 'resolved') {
      this.options.metrics.recordBackendRefValidation(route.metricsLabel, 'success', '');
    }
    return resolution;
  }

  private logIgnoredBackends(route: RouteIdentity, refs: readonly BackendRef[]): void {
    const { logger } = this.options;

    if (refs.length > 1) {
      logger.info(PARTIALLY_APPLIED, {
        route: routeKey(route),
        reason: 'multiple backendRefs specified, using only highest weight',
        total_backends: refs.length,
        ignored_backends: refs.length - 1,
      });
    }

    refs.forEach((ref, idx) => {
      if (ref.weight !== undefined && ref.weight !== DEFAULT_BACKEND_WEIGHT && ref.weight !== 0) {
        logger.info(PARTIALLY_APPLIED, {
          route: routeKey(route),
          reason: 'backendRef weight ignored, traffic splitting not supported',
          backend: ref.name,
          backend_index: idx,
          weight: ref.weight,
        });
      }
    });
  }
}
