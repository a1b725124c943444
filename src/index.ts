/**
 * Compiles Gateway API HTTPRoute and GRPCRoute objects into ordered tunnel
 * ingress rules and reconciles them against the live tunnel configuration.
 */

export * from './core/config/index.js';
export * from './core/errors.js';
export * from './core/ingress/index.js';
export * from './core/kubernetes/index.js';
export * from './core/logging/index.js';
export * from './core/metrics/index.js';
export * from './core/types/index.js';
export * from './core/yaml/index.js';
