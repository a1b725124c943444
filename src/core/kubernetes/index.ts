/**
 * Kubernetes Module
 *
 * Client creation, error helpers, and the cluster-backed implementations of
 * the Service reader and reference validator collaborators.
 */

export {
  createKubeConfig,
  createKubernetesClients,
  createKubernetesClientsWithKubeConfig,
} from './client-provider.js';
export type { KubernetesClientConfig, KubernetesClients } from './client-provider.js';

export { abortable } from './abort.js';

export { formatKubernetesError, getErrorStatusCode, isNotFoundError } from './errors.js';
export type { KubernetesApiError } from './errors.js';

export {
  grantAllows,
  KubernetesReferenceGrantLister,
  REFERENCE_GRANT_PLURAL,
  REFERENCE_GRANT_VERSION,
  ReferenceGrantSchema,
  ReferenceGrantValidator,
} from './reference-grant-validator.js';
export type { CustomObjectListApi, ReferenceGrant, ReferenceGrantLister } from './reference-grant-validator.js';

export { KubernetesServiceReader, type ServiceApi } from './service-reader.js';
