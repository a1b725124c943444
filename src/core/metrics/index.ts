export { noopMetrics } from './noop.js';
export type { IngressMetrics, RouteKindLabel, ValidationOutcome } from './types.js';
