/**
 * Route manifest loading
 */

export { parseRouteManifests, type RouteManifests } from './route-manifests.js';
export { GRPCRouteSchema, HTTPRouteSchema } from './route-schemas.js';
