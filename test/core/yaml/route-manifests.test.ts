import { describe, expect, it } from 'vitest';
import { ManifestValidationError } from '../../../src/core/errors.js';
import { parseRouteManifests } from '../../../src/core/yaml/route-manifests.js';

const manifests = `
apiVersion: v1
kind: Service
metadata:
  name: web
---
apiVersion: gateway.networking.k8s.io/v1
kind: HTTPRoute
metadata:
  name: app
  namespace: shop
spec:
  hostnames:
    - app.example.com
  rules:
    - matches:
        - path:
            type: Exact
            value: /health
      backendRefs:
        - name: web
          port: 8080
---
apiVersion: gateway.networking.k8s.io/v1
kind: GRPCRoute
metadata:
  name: cart
spec:
  rules:
    - matches:
        - method:
            service: shop.v1.Cart
      backendRefs:
        - name: cart
          port: 9090
---
apiVersion: gateway.networking.k8s.io/v1
kind: Gateway
metadata:
  name: edge
`;

describe('parseRouteManifests', () => {
  it('keeps HTTPRoute and GRPCRoute documents in order', () => {
    const { httpRoutes, grpcRoutes } = parseRouteManifests(manifests);

    expect(httpRoutes).toHaveLength(1);
    expect(httpRoutes[0]?.metadata).toEqual({ name: 'app', namespace: 'shop' });
    expect(httpRoutes[0]?.spec.rules?.[0]?.matches?.[0]?.path).toEqual({ type: 'Exact', value: '/health' });
    expect(httpRoutes[0]?.spec.rules?.[0]?.backendRefs).toEqual([{ name: 'web', port: 8080 }]);

    expect(grpcRoutes).toHaveLength(1);
    expect(grpcRoutes[0]?.metadata.name).toBe('cart');
    expect(grpcRoutes[0]?.spec.rules?.[0]?.matches?.[0]?.method).toEqual({ service: 'shop.v1.Cart' });
  });

  it('returns nothing for empty input', () => {
    expect(parseRouteManifests('')).toEqual({ httpRoutes: [], grpcRoutes: [] });
    expect(parseRouteManifests('---\n---\n')).toEqual({ httpRoutes: [], grpcRoutes: [] });
  });

  it('rejects a route that does not match its schema', () => {
    const invalid = `
apiVersion: gateway.networking.k8s.io/v1
kind: HTTPRoute
metadata:
  name: broken
spec:
  rules:
    - backendRefs:
        - name: web
          weight: -1
`;

    expect(() => parseRouteManifests(invalid)).toThrow(ManifestValidationError);
    expect(() => parseRouteManifests(invalid)).toThrow(/^Invalid HTTPRoute 'broken' in document 0: /);
  });

  it('reports the document index of the invalid route', () => {
    const invalid = `
apiVersion: gateway.networking.k8s.io/v1
kind: GRPCRoute
metadata:
  name: ok
spec: {}
---
apiVersion: gateway.networking.k8s.io/v1
kind: GRPCRoute
metadata:
  name: nameless-spec
`;

    try {
      parseRouteManifests(invalid);
      expect.unreachable('expected a ManifestValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestValidationError);
      if (error instanceof ManifestValidationError) {
        expect(error.documentIndex).toBe(1);
        expect(error.resourceName).toBe('nameless-spec');
        expect(error.resourceKind).toBe('GRPCRoute');
      }
    }
  });
});
