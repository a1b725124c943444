import type { CoreV1Api } from '@kubernetes/client-node';
import { ResourceNotFoundError } from '../errors.js';
import type { BackendService, ServiceReader } from '../types/references.js';
import { abortable } from './abort.js';
import { isNotFoundError } from './errors.js';

/**
 * The slice of CoreV1Api the reader calls
 */
export type ServiceApi = Pick<CoreV1Api, 'readNamespacedService'>;

/**
 * Service reader backed by the core/v1 API. An aborted signal rejects the
 * lookup with the signal's reason, before or during the request.
 */
export class KubernetesServiceReader implements ServiceReader {
  constructor(private readonly coreV1Api: ServiceApi) {}

  async getService(namespace: string, name: string, signal?: AbortSignal): Promise<BackendService> {
    signal?.throwIfAborted();

    try {
      const service = await abortable(this.coreV1Api.readNamespacedService({ name, namespace }), signal);
      return {
        type: service.spec?.type,
        externalName: service.spec?.externalName,
      };
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new ResourceNotFoundError('Service', namespace, name);
      }
      throw error;
    }
  }
}
