import { type } from 'arktype';

export const SYNC_STRATEGIES = ['minimal-patch', 'replace-on-change'] as const;

/**
 * How a freshly built rule list is reconciled with the live one.
 *
 * - `minimal-patch` keeps live order, drops removed rules and appends new ones.
 *   An order-only change is reported but not corrected.
 * - `replace-on-change` submits the freshly built list whenever membership or
 *   order differs.
 */
export type SyncStrategy = (typeof SYNC_STRATEGIES)[number];

export const IngressConfigSchema = type({
  clusterDomain: 'string > 0',
  maxIngressRules: 'number.integer > 0',
  syncStrategy: "'minimal-patch' | 'replace-on-change'",
  reportUnsupportedBackends: 'boolean',
  strictCatchAll: 'boolean',
});

export type IngressConfig = typeof IngressConfigSchema.infer;
