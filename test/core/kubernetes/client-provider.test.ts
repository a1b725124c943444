import { CoreV1Api, CustomObjectsApi, KubeConfig } from '@kubernetes/client-node';
import { describe, expect, it } from 'vitest';
import {
  createKubernetesClients,
  createKubernetesClientsWithKubeConfig,
} from '../../../src/core/kubernetes/client-provider.js';

function testKubeConfig(): KubeConfig {
  const kubeConfig = new KubeConfig();
  kubeConfig.loadFromOptions({
    clusters: [{ name: 'test-cluster', server: 'https://127.0.0.1:6443', skipTLSVerify: true }],
    users: [{ name: 'test-user', token: 'test-token' }],
    contexts: [{ name: 'test-context', cluster: 'test-cluster', user: 'test-user' }],
    currentContext: 'test-context',
  });
  return kubeConfig;
}

describe('Kubernetes client provider', () => {
  it('creates both API clients from a KubeConfig', () => {
    const kubeConfig = testKubeConfig();

    const clients = createKubernetesClientsWithKubeConfig(kubeConfig);

    expect(clients.kubeConfig).toBe(kubeConfig);
    expect(clients.coreV1Api).toBeInstanceOf(CoreV1Api);
    expect(clients.customObjectsApi).toBeInstanceOf(CustomObjectsApi);
  });

  it('wraps kubeconfig loading failures', () => {
    expect(() => createKubernetesClients({ kubeconfigPath: '/nonexistent/kubeconfig' })).toThrow(
      /^Failed to create Kubernetes clients: /
    );
  });
});
