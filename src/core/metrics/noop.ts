import type { IngressMetrics } from './types.js';

/**
 * Metrics sink that records nothing; used when no sink is configured
 */
export const noopMetrics: IngressMetrics = {
  recordBuildDuration: () => {},
  recordBackendRefValidation: () => {},
};
