/**
 * Intermediate and wire-level shapes of the ingress compiler
 */

/**
 * Hostname sentinel for routes without hostnames
 */
export const WILDCARD_HOSTNAME = '*';

/**
 * Service string of the terminal rule that answers any unmatched request
 */
export const CATCH_ALL_SERVICE = 'http_status:404';

/**
 * Match precedence of a routing entry. Higher sorts first.
 */
export enum PathPriority {
  Prefix = 0,
  Exact = 1,
}

/**
 * One rule-match combination of a route, resolved to a backend URL
 */
export interface RoutingEntry {
  readonly hostname: string;
  /** Empty matches every path */
  readonly path: string;
  readonly service: string;
  readonly priority: PathPriority;
}

/**
 * An ingress rule in the remote configuration's shape. Absent hostname or path
 * matches anything.
 */
export interface WireRule {
  hostname?: string;
  path?: string;
  service: string;
}

/**
 * WireRule reduced for structural comparison
 */
export interface ComparableRule {
  readonly hostname: string;
  readonly path: string;
  readonly service: string;
}

export type BackendRefReason = 'RefNotPermitted' | 'BackendNotFound' | 'InvalidKind';

/**
 * A backend reference dropped from the build for a reportable reason
 */
export interface BackendRefError {
  readonly routeNamespace: string;
  readonly routeName: string;
  readonly backendName: string;
  readonly backendNamespace: string;
  readonly reasonCode: BackendRefReason;
  readonly message: string;
}

export interface BuildResult {
  readonly rules: readonly WireRule[];
  readonly failedRefs: readonly BackendRefError[];
}
