import { type } from 'arktype';
import { ConfigurationError, formatConfigurationError } from '../errors.js';
import { type IngressConfig, IngressConfigSchema } from './schema.js';

export const DEFAULT_CLUSTER_DOMAIN = 'cluster.local';

/**
 * Maximum number of ingress rules the remote tunnel configuration accepts
 */
export const DEFAULT_MAX_INGRESS_RULES = 1000;

export const DEFAULT_INGRESS_CONFIG: IngressConfig = {
  clusterDomain: DEFAULT_CLUSTER_DOMAIN,
  maxIngressRules: DEFAULT_MAX_INGRESS_RULES,
  syncStrategy: 'replace-on-change',
  reportUnsupportedBackends: false,
  strictCatchAll: false,
};

function parseInteger(name: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`, name);
  }
  return value;
}

function parseBoolean(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigurationError(`${name} must be "true" or "false", got "${raw}"`, name);
  }
}

/**
 * Read the environment into a partial configuration. Unset variables are
 * left out so defaults and overrides apply.
 */
export function getIngressConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (env.TUNNEL_INGRESS_CLUSTER_DOMAIN !== undefined) {
    config.clusterDomain = env.TUNNEL_INGRESS_CLUSTER_DOMAIN.trim();
  }

  if (env.TUNNEL_INGRESS_MAX_RULES !== undefined) {
    config.maxIngressRules = parseInteger('TUNNEL_INGRESS_MAX_RULES', env.TUNNEL_INGRESS_MAX_RULES);
  }

  if (env.TUNNEL_INGRESS_SYNC_STRATEGY !== undefined) {
    config.syncStrategy = env.TUNNEL_INGRESS_SYNC_STRATEGY.trim();
  }

  if (env.TUNNEL_INGRESS_REPORT_UNSUPPORTED_BACKENDS !== undefined) {
    config.reportUnsupportedBackends = parseBoolean(
      'TUNNEL_INGRESS_REPORT_UNSUPPORTED_BACKENDS',
      env.TUNNEL_INGRESS_REPORT_UNSUPPORTED_BACKENDS
    );
  }

  if (env.TUNNEL_INGRESS_STRICT_CATCH_ALL !== undefined) {
    config.strictCatchAll = parseBoolean('TUNNEL_INGRESS_STRICT_CATCH_ALL', env.TUNNEL_INGRESS_STRICT_CATCH_ALL);
  }

  return config;
}

/**
 * Validate an arbitrary value against the configuration schema
 */
export function validateIngressConfig(candidate: unknown): IngressConfig {
  const result = IngressConfigSchema(candidate);

  if (result instanceof type.errors) {
    throw formatConfigurationError(result.summary, 'ingress configuration');
  }

  return result;
}

/**
 * Resolve configuration: defaults, then environment, then explicit overrides.
 */
export function loadIngressConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<IngressConfig> = {}
): IngressConfig {
  return validateIngressConfig({
    ...DEFAULT_INGRESS_CONFIG,
    ...getIngressConfigFromEnv(env),
    ...overrides,
  });
}
