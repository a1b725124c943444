/**
 * ReferenceGrant-backed reference validation
 *
 * A ReferenceGrant lives in the namespace of the object being referenced and
 * lists which (group, kind, namespace) triples may point at which
 * (group, kind, name?) targets in that namespace.
 */

import type { CustomObjectsApi } from '@kubernetes/client-node';
import { type } from 'arktype';
import { getComponentLogger, type IngressLogger } from '../logging/index.js';
import { GATEWAY_API_GROUP } from '../types/routes.js';
import type { Reference, ReferenceValidator } from '../types/references.js';
import { abortable } from './abort.js';

export const REFERENCE_GRANT_VERSION = 'v1beta1';
export const REFERENCE_GRANT_PLURAL = 'referencegrants';

const ReferenceGrantFromSchema = type({
  group: 'string',
  kind: 'string',
  namespace: 'string',
});

const ReferenceGrantToSchema = type({
  group: 'string',
  kind: 'string',
  'name?': 'string',
});

export const ReferenceGrantSchema = type({
  'metadata?': {
    'name?': 'string',
    'namespace?': 'string',
  },
  spec: {
    from: ReferenceGrantFromSchema.array(),
    to: ReferenceGrantToSchema.array(),
  },
});

export type ReferenceGrant = typeof ReferenceGrantSchema.infer;

/**
 * Lists the raw ReferenceGrant objects of one namespace
 */
export interface ReferenceGrantLister {
  listReferenceGrants(namespace: string, signal?: AbortSignal): Promise<unknown[]>;
}

export type CustomObjectListApi = Pick<CustomObjectsApi, 'listNamespacedCustomObject'>;

/**
 * Lister backed by the custom objects API. An aborted signal rejects the
 * listing with the signal's reason, before or during the request.
 */
export class KubernetesReferenceGrantLister implements ReferenceGrantLister {
  constructor(private readonly customObjectsApi: CustomObjectListApi) {}

  async listReferenceGrants(namespace: string, signal?: AbortSignal): Promise<unknown[]> {
    signal?.throwIfAborted();

    const list: unknown = await abortable(
      this.customObjectsApi.listNamespacedCustomObject({
        group: GATEWAY_API_GROUP,
        version: REFERENCE_GRANT_VERSION,
        namespace,
        plural: REFERENCE_GRANT_PLURAL,
      }),
      signal
    );

    if (typeof list === 'object' && list !== null && 'items' in list && Array.isArray(list.items)) {
      return list.items;
    }
    return [];
  }
}

/**
 * Whether a single grant authorizes `from` to reference `to`
 */
export function grantAllows(grant: ReferenceGrant, from: Reference, to: Reference): boolean {
  const fromMatches = grant.spec.from.some(
    (entry) =>
      entry.group === from.group && entry.kind === from.kind && entry.namespace === from.namespace
  );
  if (!fromMatches) {
    return false;
  }

  return grant.spec.to.some(
    (entry) =>
      entry.group === to.group &&
      entry.kind === to.kind &&
      (entry.name === undefined || entry.name === '' || entry.name === to.name)
  );
}

export class ReferenceGrantValidator implements ReferenceValidator {
  private readonly logger: IngressLogger;

  constructor(
    private readonly lister: ReferenceGrantLister,
    logger?: IngressLogger
  ) {
    this.logger = logger ?? getComponentLogger('reference-grant-validator');
  }

  async isReferenceAllowed(from: Reference, to: Reference, signal?: AbortSignal): Promise<boolean> {
    if (from.namespace === to.namespace) {
      return true;
    }

    const rawGrants = await this.lister.listReferenceGrants(to.namespace, signal);

    for (const raw of rawGrants) {
      const grant = ReferenceGrantSchema(raw);
      if (grant instanceof type.errors) {
        this.logger.warn('skipping malformed ReferenceGrant', {
          namespace: to.namespace,
          error: grant.summary,
        });
        continue;
      }

      if (grantAllows(grant, from, to)) {
        return true;
      }
    }

    return false;
  }
}
