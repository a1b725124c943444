/**
 * Metrics label for a route kind
 */
export type RouteKindLabel = 'http' | 'grpc';

export type ValidationOutcome = 'success' | 'failed';

/**
 * Sink for build metrics. Implementations map these onto whatever metrics
 * backend the host process uses.
 */
export interface IngressMetrics {
  recordBuildDuration(routeKind: RouteKindLabel, durationMs: number): void;
  /** `reason` is empty for successful validations */
  recordBackendRefValidation(routeKind: RouteKindLabel, outcome: ValidationOutcome, reason: string): void;
}
