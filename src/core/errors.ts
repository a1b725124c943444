/**
 * Error types for the ingress compiler
 *
 * Build passes never throw for a bad backend reference; those are reported
 * through `BuildResult.failedRefs`. The classes here cover what does throw:
 * configuration, manifest parsing, collaborator lookups and the rule limit.
 */

export class TunnelIngressError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TunnelIngressError';
  }
}

export class ConfigurationError extends TunnelIngressError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly suggestions?: string[]
  ) {
    super(message, 'CONFIGURATION_ERROR', { field, suggestions });
    this.name = 'ConfigurationError';
  }
}

export class ManifestValidationError extends TunnelIngressError {
  constructor(
    message: string,
    public readonly resourceKind: string,
    public readonly resourceName: string,
    public readonly documentIndex: number
  ) {
    super(message, 'MANIFEST_VALIDATION_ERROR', { resourceKind, resourceName, documentIndex });
    this.name = 'ManifestValidationError';
  }
}

/**
 * Typed not-found raised by collaborators such as the Service reader.
 * Carries `statusCode` so the Kubernetes error helpers classify it like an
 * API 404.
 */
export class ResourceNotFoundError extends TunnelIngressError {
  public readonly statusCode = 404;

  constructor(
    public readonly resourceKind: string,
    public readonly namespace: string,
    public readonly resourceName: string
  ) {
    super(`${resourceKind} ${namespace}/${resourceName} not found`, 'RESOURCE_NOT_FOUND', {
      resourceKind,
      namespace,
      resourceName,
    });
    this.name = 'ResourceNotFoundError';
  }
}

export class IngressRuleLimitError extends TunnelIngressError {
  constructor(
    public readonly ruleCount: number,
    public readonly maxRules: number
  ) {
    super(
      `ingress rules limit exceeded: ${ruleCount} rules (max ${maxRules})`,
      'INGRESS_RULE_LIMIT_EXCEEDED',
      { ruleCount, maxRules }
    );
    this.name = 'IngressRuleLimitError';
  }
}

/**
 * Build a ConfigurationError from an arktype validation summary
 */
export function formatConfigurationError(summary: string, source: string): ConfigurationError {
  const firstLine = summary.split('\n')[0] ?? summary;
  const field = firstLine.includes(' must ') ? firstLine.split(' must ')[0]?.trim() : undefined;

  return new ConfigurationError(`Invalid ${source}: ${summary}`, field, [
    'Check the TUNNEL_INGRESS_* environment variables and explicit overrides',
  ]);
}
