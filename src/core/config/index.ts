export {
  DEFAULT_CLUSTER_DOMAIN,
  DEFAULT_INGRESS_CONFIG,
  DEFAULT_MAX_INGRESS_RULES,
  getIngressConfigFromEnv,
  loadIngressConfig,
  validateIngressConfig,
} from './config.js';
export { IngressConfigSchema, SYNC_STRATEGIES } from './schema.js';
export type { IngressConfig, SyncStrategy } from './schema.js';
