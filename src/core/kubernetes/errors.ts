/**
 * Kubernetes Error Handling Utilities
 *
 * The fetch-based client (1.x) rejects with an `ApiException` carrying a
 * numeric `code`; older and hand-rolled errors use `statusCode`,
 * `response.statusCode` or a Status object under `body`.
 */

import { getComponentLogger } from '../logging/index.js';

const logger = getComponentLogger('kubernetes-errors');

/**
 * Interface representing a Kubernetes API error with various possible structures.
 */
export interface KubernetesApiError {
  statusCode?: number;
  code?: number | string;
  response?: {
    statusCode?: number;
  };
  body?: {
    code?: number;
    message?: string;
    reason?: string;
  };
  message?: string;
  name?: string;
}

function isErrorShape(error: unknown): error is KubernetesApiError {
  return typeof error === 'object' && error !== null;
}

/**
 * Extract the HTTP status code from a Kubernetes API error.
 *
 * @returns The HTTP status code, or undefined if not found
 *
 * @example
 * ```typescript
 * try {
 *   await coreApi.readNamespacedService({ name, namespace });
 * } catch (error) {
 *   if (getErrorStatusCode(error) === 404) {
 *     // Handle not found
 *   }
 * }
 * ```
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (!isErrorShape(error)) {
    return undefined;
  }

  if (typeof error.statusCode === 'number') {
    return error.statusCode;
  }

  // ApiException (1.x); Node system errors use string codes such as ECONNREFUSED
  if (typeof error.code === 'number') {
    return error.code;
  }

  if (typeof error.response?.statusCode === 'number') {
    return error.response.statusCode;
  }

  if (typeof error.body === 'object' && error.body !== null && typeof error.body.code === 'number') {
    return error.body.code;
  }

  logger.debug('Could not extract status code from error', {
    errorType: typeof error,
    errorKeys: Object.keys(error),
  });

  return undefined;
}

/**
 * Check if an error is a "Not Found" (404) error.
 */
export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

/**
 * Format a Kubernetes API error into a human-readable message.
 *
 * @example
 * ```typescript
 * formatKubernetesError({ statusCode: 403, body: { reason: 'Forbidden', message: 'denied' } });
 * // "Kubernetes API error (403): Forbidden: denied"
 * ```
 */
export function formatKubernetesError(error: unknown): string {
  if (!isErrorShape(error)) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const parts: string[] = [];

  if (statusCode !== undefined) {
    parts.push(`Kubernetes API error (${statusCode})`);
  } else {
    parts.push('Kubernetes API error');
  }

  const body = typeof error.body === 'object' && error.body !== null ? error.body : undefined;

  if (body?.reason) {
    parts.push(body.reason);
  }

  if (body?.message) {
    parts.push(body.message);
  } else if (error.message) {
    parts.push(error.message);
  }

  return parts.join(': ');
}
