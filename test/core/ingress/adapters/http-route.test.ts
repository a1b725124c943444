import { describe, expect, it } from 'vitest';
import { extractHTTPPath, httpRouteAdapter } from '../../../../src/core/ingress/adapters/http-route.js';
import { BackendResolver } from '../../../../src/core/ingress/backend-resolver.js';
import { PathPriority } from '../../../../src/core/types/ingress.js';
import { FakeReferenceValidator, RecordingLogger, RecordingMetrics } from '../../../helpers/fakes.js';
import { httpRoute } from '../../../helpers/routes.js';

function createContext(validator?: FakeReferenceValidator) {
  const logger = new RecordingLogger();
  const resolver = new BackendResolver({
    clusterDomain: 'cluster.local',
    validator,
    metrics: new RecordingMetrics(),
    logger,
    reportUnsupportedBackends: false,
  });
  return { resolver, logger };
}

describe('extractHTTPPath', () => {
  const logger = new RecordingLogger();

  it('matches the whole host without a path match', () => {
    expect(extractHTTPPath(logger, 'default/app', undefined)).toEqual({ path: '', priority: PathPriority.Prefix });
  });

  it('keeps Exact matches exact', () => {
    expect(extractHTTPPath(logger, 'default/app', { type: 'Exact', value: '/health' })).toEqual({
      path: '/health',
      priority: PathPriority.Exact,
    });
  });

  it('defaults to a PathPrefix match on /', () => {
    expect(extractHTTPPath(logger, 'default/app', {})).toEqual({ path: '/', priority: PathPriority.Prefix });
    expect(extractHTTPPath(logger, 'default/app', { value: '/api' })).toEqual({
      path: '/api',
      priority: PathPriority.Prefix,
    });
  });

  it('treats RegularExpression as a prefix and warns', () => {
    const recording = new RecordingLogger();

    expect(extractHTTPPath(recording, 'default/app', { type: 'RegularExpression', value: '/v[0-9]+' })).toEqual({
      path: '/v[0-9]+',
      priority: PathPriority.Prefix,
    });
    expect(recording.entries).toEqual([
      {
        level: 'warn',
        msg: 'route configuration partially applied',
        meta: {
          route: 'default/app',
          reason: 'RegularExpression path type treated as PathPrefix',
          path: '/v[0-9]+',
        },
      },
    ]);
  });
});

describe('HTTPRouteAdapter', () => {
  it('defaults a missing namespace to default', () => {
    expect(httpRouteAdapter.getMeta({ metadata: { name: 'app' }, spec: {} })).toEqual({
      namespace: 'default',
      name: 'app',
    });
  });

  it('uses the wildcard hostname when none are declared', () => {
    expect(httpRouteAdapter.getHostnames(httpRoute('app', []))).toEqual(['*']);
    expect(httpRouteAdapter.getHostnames(httpRoute('app', [], { hostnames: [] }))).toEqual(['*']);
    expect(httpRouteAdapter.getHostnames(httpRoute('app', [], { hostnames: ['app.example.com'] }))).toEqual([
      'app.example.com',
    ]);
  });

  it('emits one entry per hostname, rule and match', async () => {
    const context = createContext();
    const route = httpRoute(
      'app',
      [
        {
          matches: [{ path: { type: 'Exact', value: '/health' } }, { path: { value: '/api' } }],
          backendRefs: [{ name: 'api', port: 8080 }],
        },
        { backendRefs: [{ name: 'web' }] },
      ],
      { hostnames: ['a.example.com', 'b.example.com'] }
    );

    const { entries, failedRefs } = await httpRouteAdapter.extractEntries(route, context);

    const api = 'http://api.default.svc.cluster.local:8080';
    const web = 'http://web.default.svc.cluster.local:80';
    expect(failedRefs).toEqual([]);
    expect(entries).toEqual([
      { hostname: 'a.example.com', path: '/health', service: api, priority: PathPriority.Exact },
      { hostname: 'a.example.com', path: '/api', service: api, priority: PathPriority.Prefix },
      { hostname: 'a.example.com', path: '', service: web, priority: PathPriority.Prefix },
      { hostname: 'b.example.com', path: '/health', service: api, priority: PathPriority.Exact },
      { hostname: 'b.example.com', path: '/api', service: api, priority: PathPriority.Prefix },
      { hostname: 'b.example.com', path: '', service: web, priority: PathPriority.Prefix },
    ]);
  });

  it('reports a failed reference once regardless of hostname count', async () => {
    const validator = new FakeReferenceValidator();
    const context = createContext(validator);
    const route = httpRoute('app', [{ backendRefs: [{ name: 'api', namespace: 'backend' }] }], {
      hostnames: ['a.example.com', 'b.example.com', 'c.example.com'],
    });

    const { entries, failedRefs } = await httpRouteAdapter.extractEntries(route, context);

    expect(entries).toEqual([]);
    expect(failedRefs.map((ref) => ref.reasonCode)).toEqual(['RefNotPermitted']);
    expect(validator.calls).toHaveLength(1);
  });

  it('drops rules without backends', async () => {
    const context = createContext();
    const route = httpRoute('app', [{ matches: [{ path: { value: '/orphan' } }] }]);

    const { entries, failedRefs } = await httpRouteAdapter.extractEntries(route, context);

    expect(entries).toEqual([]);
    expect(failedRefs).toEqual([]);
  });

  it('logs the match features and filters it cannot express', async () => {
    const context = createContext();
    const route = httpRoute('app', [
      {
        matches: [
          {
            path: { value: '/api' },
            headers: [{ name: 'x-env', value: 'canary' }],
            queryParams: [{ name: 'debug', value: '1' }],
            method: 'POST',
          },
        ],
        filters: [{ type: 'RequestHeaderModifier' }],
        backendRefs: [{ name: 'api' }],
      },
    ]);

    await httpRouteAdapter.extractEntries(route, context);

    expect(context.logger.reasons()).toEqual([
      'filters not supported by Cloudflare Tunnel',
      'header matching not supported by Cloudflare Tunnel',
      'query parameter matching not supported by Cloudflare Tunnel',
      'method matching not supported by Cloudflare Tunnel',
    ]);
  });
});
