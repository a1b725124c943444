/**
 * Kubernetes Client Provider
 *
 * Loads a KubeConfig and hands out the two API clients the collaborators need.
 */

import * as k8s from '@kubernetes/client-node';
import { getComponentLogger } from '../logging/index.js';

/**
 * Configuration options for the Kubernetes clients
 */
export interface KubernetesClientConfig {
  /**
   * Custom kubeconfig file path; the default loading rules apply otherwise
   * (KUBECONFIG, ~/.kube/config, in-cluster service account)
   */
  kubeconfigPath?: string;

  /**
   * Context to switch to after loading
   */
  context?: string;
}

export interface KubernetesClients {
  kubeConfig: k8s.KubeConfig;
  coreV1Api: k8s.CoreV1Api;
  customObjectsApi: k8s.CustomObjectsApi;
}

const logger = getComponentLogger('kubernetes-client-provider');

export function createKubeConfig(config: KubernetesClientConfig = {}): k8s.KubeConfig {
  const kubeConfig = new k8s.KubeConfig();

  if (config.kubeconfigPath) {
    kubeConfig.loadFromFile(config.kubeconfigPath);
  } else {
    kubeConfig.loadFromDefault();
  }

  if (config.context) {
    kubeConfig.setCurrentContext(config.context);
  }

  return kubeConfig;
}

/**
 * Create the API clients from a pre-configured KubeConfig
 */
export function createKubernetesClientsWithKubeConfig(kubeConfig: k8s.KubeConfig): KubernetesClients {
  return {
    kubeConfig,
    coreV1Api: kubeConfig.makeApiClient(k8s.CoreV1Api),
    customObjectsApi: kubeConfig.makeApiClient(k8s.CustomObjectsApi),
  };
}

export function createKubernetesClients(config: KubernetesClientConfig = {}): KubernetesClients {
  try {
    const kubeConfig = createKubeConfig(config);
    const clients = createKubernetesClientsWithKubeConfig(kubeConfig);

    logger.debug('Kubernetes clients created', {
      currentContext: kubeConfig.getCurrentContext(),
      server: kubeConfig.getCurrentCluster()?.server,
    });

    return clients;
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    logger.error('Failed to create Kubernetes clients', cause);
    throw new Error(`Failed to create Kubernetes clients: ${cause.message}`, { cause });
  }
}
