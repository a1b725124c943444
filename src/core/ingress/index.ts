/**
 * Ingress rule compilation and reconciliation
 */

export * from './adapters/index.js';
export {
  type BackendResolution,
  BackendResolver,
  type BackendResolverOptions,
  type RouteIdentity,
} from './backend-resolver.js';
export {
  type BuildOptions,
  createGRPCRouteBuilder,
  createHTTPRouteBuilder,
  IngressBuilder,
  type IngressBuilderOptions,
} from './builder.js';
export {
  DEFAULT_BACKEND_WEIGHT,
  DEFAULT_HTTP_PORT,
  DEFAULT_HTTPS_PORT,
  PARTIALLY_APPLIED,
} from './constants.js';
export {
  applyDiff,
  type CatchAllOptions,
  diffRules,
  ensureCatchAll,
  isCatchAll,
  type RuleDiff,
  ruleKey,
  rulesEqual,
  toComparableRule,
  toWireRule,
} from './diff.js';
export { catchAllRule, renderRule, renderRules } from './render.js';
export { compareRoutingEntries, compareWireRules, sortRoutingEntries, wireRuleSortKey } from './sort.js';
export { mergeRouteRules, planTunnelSync, type TunnelSyncInput, type TunnelSyncPlan } from './sync.js';
export { NO_BACKEND_SELECTED, selectHighestWeightIndex, type WeightedRef } from './weight.js';
