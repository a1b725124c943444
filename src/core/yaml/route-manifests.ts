import * as yaml from 'js-yaml';
import { type } from 'arktype';
import { ManifestValidationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { GATEWAY_API_GROUP, type GRPCRoute, type HTTPRoute } from '../types/routes.js';
import { GRPCRouteSchema, HTTPRouteSchema } from './route-schemas.js';

const logger = getComponentLogger('route-manifests');

export interface RouteManifests {
  httpRoutes: HTTPRoute[];
  grpcRoutes: GRPCRoute[];
}

function describeDocument(doc: object): { kind: string; apiVersion: string; name: string } {
  const kind = 'kind' in doc && typeof doc.kind === 'string' ? doc.kind : '';
  const apiVersion = 'apiVersion' in doc && typeof doc.apiVersion === 'string' ? doc.apiVersion : '';
  const metadata = 'metadata' in doc ? doc.metadata : undefined;
  const name =
    typeof metadata === 'object' && metadata !== null && 'name' in metadata && typeof metadata.name === 'string'
      ? metadata.name
      : 'unnamed';
  return { kind, apiVersion, name };
}

/**
 * Parse a multi-document YAML stream and keep the Gateway API HTTPRoute and
 * GRPCRoute objects, in document order.
 *
 * @throws ManifestValidationError when a route does not match its schema
 */
export function parseRouteManifests(content: string): RouteManifests {
  const result: RouteManifests = { httpRoutes: [], grpcRoutes: [] };

  yaml.loadAll(content).forEach((doc, index) => {
    if (typeof doc !== 'object' || doc === null) {
      return;
    }

    const { kind, apiVersion, name } = describeDocument(doc);
    if (!apiVersion.startsWith(`${GATEWAY_API_GROUP}/`)) {
      logger.debug('skipping non Gateway API document', { index, kind, apiVersion });
      return;
    }

    if (kind === 'HTTPRoute') {
      const route = HTTPRouteSchema(doc);
      if (route instanceof type.errors) {
        throw new ManifestValidationError(
          `Invalid HTTPRoute '${name}' in document ${index}: ${route.summary}`,
          kind,
          name,
          index
        );
      }
      result.httpRoutes.push(route);
    } else if (kind === 'GRPCRoute') {
      const route = GRPCRouteSchema(doc);
      if (route instanceof type.errors) {
        throw new ManifestValidationError(
          `Invalid GRPCRoute '${name}' in document ${index}: ${route.summary}`,
          kind,
          name,
          index
        );
      }
      result.grpcRoutes.push(route);
    } else {
      logger.debug('skipping unsupported route kind', { index, kind, name });
    }
  });

  return result;
}
